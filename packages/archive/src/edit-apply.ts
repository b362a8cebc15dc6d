/**
 * Edit Application Engine — applies edit blocks to line-oriented text.
 *
 * Edits apply strictly in order, each against the output of the previous
 * one, so a later search can fail if an earlier edit removed its lines.
 * Returns new text; inputs are never mutated.
 */

import type { EditBlock, EditRef, MatchPolicy, ResolvedEdit } from './types';
import type { Archive } from './archive';
import type { ApplyConfigInput } from './schemas';
import { ApplyConfigSchema } from './schemas';
import { ArchiveError, EditApplyError } from './errors';
import { decodeUtf8, splitLines } from './bytes';

export function applyEdits(content: string, edits: EditBlock[], options: ApplyConfigInput = {}): string {
  const { matchPolicy } = ApplyConfigSchema.parse(options);

  if (content === '') {
    const firstNonInsert = edits.findIndex(e => e.operation !== 'insert');
    if (firstNonInsert !== -1) {
      throw new EditApplyError('empty-content', 'Cannot apply edit to empty content', {
        editIndex: firstNonInsert,
      });
    }
  }

  let lines = splitLines(content);
  edits.forEach((edit, i) => {
    lines = applyOne(lines, edit, i, matchPolicy);
  });

  return lines.join('\n');
}

export function applyEditRef(content: string, ref: EditRef, options: ApplyConfigInput = {}): string {
  return applyEdits(content, ref.edits, options);
}

function applyOne(lines: string[], edit: EditBlock, editIndex: number, policy: MatchPolicy): string[] {
  switch (edit.operation) {
    case 'insert':
      return [...edit.replacement, ...lines];
    case 'replace': {
      if (edit.search.length === 0) {
        return [...edit.replacement, ...lines];
      }
      const start = findSearchBlock(lines, edit.search, editIndex, policy);
      return [...lines.slice(0, start), ...edit.replacement, ...lines.slice(start + edit.search.length)];
    }
    case 'delete': {
      const start = findSearchBlock(lines, edit.search, editIndex, policy);
      return [...lines.slice(0, start), ...lines.slice(start + edit.search.length)];
    }
  }
}

function matchesAt(lines: string[], search: string[], start: number): boolean {
  for (let i = 0; i < search.length; i++) {
    if (lines[start + i] !== search[i]) return false;
  }
  return true;
}

/**
 * Every offset where `search` occurs as a contiguous run of whole lines.
 */
export function findOccurrences(lines: string[], search: string[]): number[] {
  const found: number[] = [];
  if (search.length === 0) return found;
  for (let start = 0; start + search.length <= lines.length; start++) {
    if (matchesAt(lines, search, start)) found.push(start);
  }
  return found;
}

function findSearchBlock(lines: string[], search: string[], editIndex: number, policy: MatchPolicy): number {
  const searchText = search.length === 0 ? '(empty)' : search.join('\n');
  const occurrences = findOccurrences(lines, search);

  if (occurrences.length === 0) {
    throw new EditApplyError('search-not-found', `Search pattern not found: '${searchText}'`, {
      editIndex,
      search: searchText,
    });
  }

  if (policy === 'unique' && occurrences.length > 1) {
    throw new EditApplyError(
      'multiple-matches',
      `Search pattern found ${occurrences.length} times (ambiguous): '${searchText}'`,
      { editIndex, search: searchText, count: occurrences.length }
    );
  }

  return occurrences[0];
}

/**
 * Apply every edit file in the archive to its target.
 *
 * The target text comes from the archive's normal file of the same name,
 * otherwise from `readTarget`. Several edit files for one target apply in
 * archive order; one result is returned per target.
 */
export function resolveEditTargets(
  archive: Archive,
  readTarget: (name: string) => string | null,
  options: ApplyConfigInput = {}
): ResolvedEdit[] {
  const results = new Map<string, ResolvedEdit>();

  for (const file of archive.files) {
    if (!file.editRef) continue;

    let current = results.get(file.name);
    if (!current) {
      const target = archive.findFile(file.name);
      if (target) {
        const text = decodeUtf8(target.data);
        if (text === null) {
          throw new EditApplyError('invalid-utf8', `Edit target '${file.name}' is not valid UTF-8`);
        }
        current = { name: file.name, source: 'archive', content: text };
      } else {
        const text = readTarget(file.name);
        if (text === null) {
          throw new ArchiveError(`Edit target file '${file.name}' not found in archive or filesystem`, file.name);
        }
        current = { name: file.name, source: 'external', content: text };
      }
    }

    results.set(file.name, { ...current, content: applyEditRef(current.content, file.editRef, options) });
  }

  return [...results.values()];
}
