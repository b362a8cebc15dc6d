/**
 * Archive aggregate.
 *
 * Owns the comment, the commands extracted from it and the ordered file
 * list. The href index is rebuilt whenever the comment changes.
 */

import type { ArchiveFile, Command, SnippetRefIssue } from './types';
import { ArchiveError } from './errors';
import { extractCommands } from './commands';
import { isNormalFile } from './file';

export class Archive {
  private _comment = '';
  private _commands: Command[] = [];
  private commandIndex = new Map<string, number>();
  private readonly _files: ArchiveFile[] = [];

  constructor(comment = '') {
    this.setComment(comment);
  }

  static withComment(comment: string): Archive {
    return new Archive(comment);
  }

  get comment(): string {
    return this._comment;
  }

  get commands(): readonly Command[] {
    return this._commands;
  }

  get files(): readonly ArchiveFile[] {
    return this._files;
  }

  /**
   * Replace the comment and re-extract its command links.
   */
  setComment(comment: string): void {
    this._comment = comment;
    this._commands = extractCommands(comment);
    this.rebuildCommandIndex();
  }

  private rebuildCommandIndex(): void {
    this.commandIndex = new Map();
    this._commands.forEach((cmd, i) => this.commandIndex.set(cmd.href, i));
  }

  getCommand(href: string): Command | undefined {
    const idx = this.commandIndex.get(href);
    return idx === undefined ? undefined : this._commands[idx];
  }

  /**
   * Append a file. Normal files must have unique names; snippet and edit
   * files may repeat a name.
   */
  addFile(file: ArchiveFile): void {
    if (isNormalFile(file) && this._files.some(f => isNormalFile(f) && f.name === file.name)) {
      throw new ArchiveError(`Duplicate file: ${file.name}`, file.name);
    }
    this._files.push(file);
  }

  /** First normal file with this name, which is also what an edit file targets. */
  findFile(name: string): ArchiveFile | undefined {
    return this._files.find(f => isNormalFile(f) && f.name === name);
  }

  /**
   * Snippet references whose command href has no matching command link.
   * An empty list means every reference resolves.
   */
  validateSnippetRefs(): SnippetRefIssue[] {
    const issues: SnippetRefIssue[] = [];
    for (const file of this._files) {
      const href = file.snippetRef?.commandHref;
      if (href !== undefined && !this.commandIndex.has(href)) {
        issues.push({ file: file.name, missingCommand: href });
      }
    }
    return issues;
  }
}
