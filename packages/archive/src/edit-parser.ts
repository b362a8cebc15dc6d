/**
 * Edit-Block Parser — turns an `[.edit]` file body into edit operations.
 *
 *   <<<<<<< SEARCH
 *   ...search lines...
 *   =======
 *   ...replacement lines...
 *   >>>>>>> REPLACE   (or >>>>>>> INSERT)
 *
 * or `<<<<<<< SEARCH ... >>>>>>> DELETE`. Blocks may follow each other.
 */

import type { EditBlock } from './types';
import {
  SEARCH_MARKER,
  SEPARATOR_MARKER,
  REPLACE_MARKER,
  INSERT_MARKER,
  DELETE_MARKER,
} from './types';
import { EditParseError } from './errors';
import { splitLines } from './bytes';

export type EditParserState =
  | { kind: 'start' }
  | { kind: 'search'; search: string[]; openedAt: number }
  | { kind: 'replace'; search: string[]; replacement: string[]; openedAt: number };

export interface EditParserStep {
  state: EditParserState;
  block?: EditBlock;
}

export const INITIAL_EDIT_STATE: EditParserState = { kind: 'start' };

/**
 * Advance the parser by one line. `line` is expected right-trimmed;
 * `lineNumber` is 1-based and only used for error context. The previous
 * state is never modified.
 */
export function stepEditParser(state: EditParserState, line: string, lineNumber: number): EditParserStep {
  return advance(state, line, lineNumber, false);
}

function advance(state: EditParserState, line: string, lineNumber: number, inPlace: boolean): EditParserStep {
  switch (state.kind) {
    case 'start': {
      if (line.startsWith(SEARCH_MARKER)) {
        return { state: { kind: 'search', search: [], openedAt: lineNumber } };
      }
      if (line.startsWith('<<<<<<<')) {
        throw new EditParseError('malformed-line', `Malformed line: '${line}'`, lineNumber);
      }
      if (line !== '') {
        throw new EditParseError(
          'expected-search-start',
          `Expected ${SEARCH_MARKER} marker at the beginning of edit block`,
          lineNumber
        );
      }
      return { state };
    }
    case 'search': {
      if (line.startsWith(SEPARATOR_MARKER)) {
        return { state: { kind: 'replace', search: state.search, replacement: [], openedAt: state.openedAt } };
      }
      if (line.startsWith(DELETE_MARKER)) {
        return {
          state: INITIAL_EDIT_STATE,
          block: { search: state.search, replacement: [], operation: 'delete' },
        };
      }
      if (inPlace) {
        state.search.push(line);
        return { state };
      }
      return { state: { ...state, search: [...state.search, line] } };
    }
    case 'replace': {
      if (line.startsWith(REPLACE_MARKER) || line.startsWith(INSERT_MARKER)) {
        // Operation is provisional; finishEditParser infers inserts.
        return {
          state: INITIAL_EDIT_STATE,
          block: { search: state.search, replacement: state.replacement, operation: 'replace' },
        };
      }
      if (inPlace) {
        state.replacement.push(line);
        return { state };
      }
      return { state: { ...state, replacement: [...state.replacement, line] } };
    }
  }
}

/**
 * Validate the end state and the collected blocks.
 */
export function finishEditParser(state: EditParserState, blocks: EditBlock[]): EditBlock[] {
  if (state.kind !== 'start') {
    throw new EditParseError(
      'unterminated-block',
      `Unterminated edit block opened at line ${state.openedAt} (missing >>>>>>> marker)`
    );
  }

  return blocks.map((block): EditBlock => {
    if (block.search.length === 0 && block.replacement.length === 0) {
      throw new EditParseError('empty-block', 'Empty edit block (both search and replacement are empty)');
    }
    if (block.operation === 'replace' && block.search.length === 0) {
      return { ...block, operation: 'insert' };
    }
    return block;
  });
}

export function parseEditBlocks(content: string): EditBlock[] {
  // Line buffers are created by this loop, so they can grow in place.
  let state = INITIAL_EDIT_STATE;
  const blocks: EditBlock[] = [];

  splitLines(content).forEach((raw, i) => {
    const step = advance(state, raw.trimEnd(), i + 1, true);
    state = step.state;
    if (step.block) blocks.push(step.block);
  });

  return finishEditParser(state, blocks);
}

/**
 * Render edit blocks back to the SEARCH/REPLACE grammar.
 */
export function formatEditBlocks(edits: EditBlock[]): string {
  const lines: string[] = [];
  for (const edit of edits) {
    lines.push(SEARCH_MARKER);
    lines.push(...edit.search);
    if (edit.operation === 'delete') {
      lines.push(DELETE_MARKER);
      continue;
    }
    lines.push(SEPARATOR_MARKER);
    lines.push(...edit.replacement);
    lines.push(edit.operation === 'insert' ? INSERT_MARKER : REPLACE_MARKER);
  }
  return lines.join('\n');
}
