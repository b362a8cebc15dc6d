import { describe, it, expect } from 'vitest';
import {
  parseEditBlocks,
  formatEditBlocks,
  stepEditParser,
  finishEditParser,
  INITIAL_EDIT_STATE,
} from '../edit-parser';
import { EditParseError } from '../errors';

function parseFailure(input: string): EditParseError {
  try {
    parseEditBlocks(input);
  } catch (err) {
    if (err instanceof EditParseError) return err;
    throw err;
  }
  throw new Error('expected parseEditBlocks to fail');
}

describe('parseEditBlocks', () => {
  it('parses a replace block', () => {
    const edits = parseEditBlocks('<<<<<<< SEARCH\nold\n=======\nnew\n>>>>>>> REPLACE');
    expect(edits).toEqual([{ search: ['old'], replacement: ['new'], operation: 'replace' }]);
  });

  it('parses a delete block', () => {
    const edits = parseEditBlocks('<<<<<<< SEARCH\na\nb\n>>>>>>> DELETE\n');
    expect(edits).toEqual([{ search: ['a', 'b'], replacement: [], operation: 'delete' }]);
  });

  it('infers insert from an empty search', () => {
    expect(parseEditBlocks('<<<<<<< SEARCH\n=======\nheader\n>>>>>>> INSERT')).toEqual([
      { search: [], replacement: ['header'], operation: 'insert' },
    ]);
    expect(parseEditBlocks('<<<<<<< SEARCH\n=======\nheader\n>>>>>>> REPLACE')).toEqual([
      { search: [], replacement: ['header'], operation: 'insert' },
    ]);
  });

  it('keeps a replace with empty replacement as replace', () => {
    expect(parseEditBlocks('<<<<<<< SEARCH\ngone\n=======\n>>>>>>> REPLACE')).toEqual([
      { search: ['gone'], replacement: [], operation: 'replace' },
    ]);
  });

  it('skips blank lines between blocks but keeps them inside blocks', () => {
    const input = [
      '',
      '<<<<<<< SEARCH',
      'a',
      '',
      'b',
      '=======',
      'c',
      '>>>>>>> REPLACE',
      '',
      '<<<<<<< SEARCH',
      'x',
      '>>>>>>> DELETE',
      '',
    ].join('\n');
    expect(parseEditBlocks(input)).toEqual([
      { search: ['a', '', 'b'], replacement: ['c'], operation: 'replace' },
      { search: ['x'], replacement: [], operation: 'delete' },
    ]);
  });

  it('trims trailing whitespace from every line', () => {
    const edits = parseEditBlocks('<<<<<<< SEARCH   \n  old   \n=======\r\nnew\t\n>>>>>>> REPLACE');
    expect(edits[0].search).toEqual(['  old']);
    expect(edits[0].replacement).toEqual(['new']);
  });

  it('returns no edits for an empty body', () => {
    expect(parseEditBlocks('')).toEqual([]);
    expect(parseEditBlocks('\n\n')).toEqual([]);
  });

  it('parses long blocks', () => {
    const body = Array.from({ length: 100_000 }, (_, i) => `line ${i}`);
    const edits = parseEditBlocks(['<<<<<<< SEARCH', ...body, '=======', ...body, '>>>>>>> REPLACE'].join('\n'));
    expect(edits).toHaveLength(1);
    expect(edits[0].search).toHaveLength(100_000);
    expect(edits[0].replacement[99_999]).toBe('line 99999');
  });

  it('fails on an unterminated block', () => {
    const err = parseFailure('<<<<<<< SEARCH\nold\n=======\nnew');
    expect(err.kind).toBe('unterminated-block');
    expect(err.message).toContain('opened at line 1');
  });

  it('fails on an empty block', () => {
    expect(parseFailure('<<<<<<< SEARCH\n=======\n>>>>>>> REPLACE').kind).toBe('empty-block');
    expect(parseFailure('<<<<<<< SEARCH\n>>>>>>> DELETE').kind).toBe('empty-block');
  });

  it('fails on text before the first block', () => {
    const err = parseFailure('\nhello\n<<<<<<< SEARCH');
    expect(err.kind).toBe('expected-search-start');
    expect(err.line).toBe(2);
  });

  it('fails on an unknown opening marker', () => {
    const err = parseFailure('<<<<<<< FIND\nx');
    expect(err.kind).toBe('malformed-line');
    expect(err.line).toBe(1);
  });
});

describe('stepEditParser', () => {
  it('walks start -> search -> replace -> start', () => {
    let step = stepEditParser(INITIAL_EDIT_STATE, '<<<<<<< SEARCH', 1);
    expect(step.state.kind).toBe('search');

    step = stepEditParser(step.state, 'old', 2);
    expect(step.state).toEqual({ kind: 'search', search: ['old'], openedAt: 1 });

    step = stepEditParser(step.state, '=======', 3);
    expect(step.state.kind).toBe('replace');

    step = stepEditParser(step.state, 'new', 4);
    step = stepEditParser(step.state, '>>>>>>> REPLACE', 5);
    expect(step.state).toEqual({ kind: 'start' });
    expect(step.block).toEqual({ search: ['old'], replacement: ['new'], operation: 'replace' });
  });

  it('does not mutate the previous state', () => {
    const opened = stepEditParser(INITIAL_EDIT_STATE, '<<<<<<< SEARCH', 1).state;
    stepEditParser(opened, 'line', 2);
    expect(opened).toEqual({ kind: 'search', search: [], openedAt: 1 });
  });

  it('rejects finishing mid-block', () => {
    const opened = stepEditParser(INITIAL_EDIT_STATE, '<<<<<<< SEARCH', 1).state;
    expect(() => finishEditParser(opened, [])).toThrow(EditParseError);
  });
});

describe('formatEditBlocks', () => {
  it('renders blocks that parse back to the same edits', () => {
    const edits = parseEditBlocks(
      [
        '<<<<<<< SEARCH',
        '=======',
        '// header',
        '>>>>>>> INSERT',
        '<<<<<<< SEARCH',
        'a',
        '=======',
        'b',
        '>>>>>>> REPLACE',
        '<<<<<<< SEARCH',
        'c',
        '>>>>>>> DELETE',
      ].join('\n')
    );
    expect(parseEditBlocks(formatEditBlocks(edits))).toEqual(edits);
  });
});
