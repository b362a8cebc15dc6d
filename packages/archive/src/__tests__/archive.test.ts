import { describe, it, expect } from 'vitest';
import { Archive } from '../archive';
import { parseCommand, extractCommands } from '../commands';
import { archiveName, createFile, createFileWithEncoding, parseArchiveName, fileText } from '../file';
import type { ArchiveFile } from '../types';

function snippet(name: string, line: number, commandHref?: string): ArchiveFile {
  return { ...createFile(name, `excerpt of ${name}`), snippetRef: { commandHref, line } };
}

describe('parseCommand', () => {
  it('parses a simple link', () => {
    expect(parseCommand('[command: rg](#search1)')).toEqual({ name: 'rg', href: 'search1' });
  });

  it('trims the command name', () => {
    expect(parseCommand('[command: rg ](#search2)')).toEqual({ name: 'rg', href: 'search2' });
  });

  it('keeps multi-word names', () => {
    expect(parseCommand('[command: git diff](#change1)')).toEqual({ name: 'git diff', href: 'change1' });
  });

  it('rejects links without an href', () => {
    expect(parseCommand('[command: rg]')).toBeNull();
  });

  it('rejects hrefs without a hash', () => {
    expect(parseCommand('[command: rg](search1)')).toBeNull();
  });
});

describe('extractCommands', () => {
  it('finds links anywhere in the text, in order', () => {
    const text = 'See [x] and [command: rg](#search1) then\n[command: git diff](#change1).';
    expect(extractCommands(text)).toEqual([
      { name: 'rg', href: 'search1' },
      { name: 'git diff', href: 'change1' },
    ]);
  });

  it('does not match links split across lines', () => {
    expect(extractCommands('[command: rg]\n(#search1)')).toEqual([]);
  });
});

describe('Archive', () => {
  it('extracts commands when the comment is set', () => {
    const archive = Archive.withComment('[command: rg](#search1)\n[command: git diff](#change1)');
    expect(archive.commands).toEqual([
      { name: 'rg', href: 'search1' },
      { name: 'git diff', href: 'change1' },
    ]);
    expect(archive.getCommand('change1')).toEqual({ name: 'git diff', href: 'change1' });
  });

  it('rebuilds the command index when the comment changes', () => {
    const archive = Archive.withComment('[command: rg](#search1)');
    archive.setComment('[command: ls](#list1)');
    expect(archive.getCommand('search1')).toBeUndefined();
    expect(archive.getCommand('list1')).toEqual({ name: 'ls', href: 'list1' });
  });

  it('resolves duplicate hrefs to the last command', () => {
    const archive = Archive.withComment('[command: a](#x) [command: b](#x)');
    expect(archive.getCommand('x')).toEqual({ name: 'b', href: 'x' });
  });

  it('rejects duplicate normal files', () => {
    const archive = new Archive();
    archive.addFile(createFile('a.txt', 'one'));
    expect(() => archive.addFile(createFile('a.txt', 'two'))).toThrow('Duplicate file: a.txt');
  });

  it('allows snippet and edit files to repeat a name', () => {
    const archive = new Archive();
    archive.addFile(createFile('a.txt', 'one'));
    archive.addFile(snippet('a.txt', 10));
    archive.addFile(snippet('a.txt', 42));
    archive.addFile({ ...createFile('a.txt', ''), editRef: { edits: [] } });
    expect(archive.files).toHaveLength(4);
  });

  it('finds the normal file by name', () => {
    const archive = new Archive();
    archive.addFile(snippet('a.txt', 1));
    archive.addFile(createFile('a.txt', 'full'));
    const found = archive.findFile('a.txt');
    expect(found && fileText(found)).toBe('full');
    expect(archive.findFile('b.txt')).toBeUndefined();
  });

  it('reports snippet references to unknown commands', () => {
    const archive = Archive.withComment('[command: rg](#search1)');
    archive.addFile(snippet('a.txt', 1, 'search1'));
    archive.addFile(snippet('b.txt', 2, 'missing'));
    archive.addFile(snippet('c.txt', 3));
    expect(archive.validateSnippetRefs()).toEqual([{ file: 'b.txt', missingCommand: 'missing' }]);
  });

  it('returns an empty list when every reference resolves', () => {
    const archive = Archive.withComment('[command: rg](#search1)');
    archive.addFile(snippet('a.txt', 1, 'search1'));
    expect(archive.validateSnippetRefs()).toEqual([]);
  });
});

describe('archive names', () => {
  it('appends the base64 tag for binary files', () => {
    expect(archiveName(createFile('test.txt', 'hello'))).toBe('test.txt');
    expect(archiveName(createFileWithEncoding('image.jpg', new Uint8Array([0xff, 0xd8]), true))).toBe(
      'image.jpg[.base64]'
    );
  });

  it('splits the base64 tag off a name', () => {
    expect(parseArchiveName('test.txt')).toEqual({ name: 'test.txt', isBinary: false });
    expect(parseArchiveName('image.jpg[.base64]')).toEqual({ name: 'image.jpg', isBinary: true });
  });
});
