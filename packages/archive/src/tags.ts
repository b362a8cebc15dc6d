/**
 * Tag grammar for file markers.
 *
 * A marker's name region is `name[tag][tag]...`. Recognized tags:
 *   [.base64]
 *   [.snippet:N]  [.snippet#HREF:LINE]  [.#HREF:LINE]
 *   [.edit]       [.edit#HREF:LINE]
 * Unknown tags are skipped unless strict mode is on.
 */

import type { ArchiveFile, EditRef, SnippetRef } from './types';
import { BASE64_TAG } from './types';
import { TagParseError } from './errors';

const SNIPPET_SHORTHAND_PREFIX = '[.#';
const SNIPPET_HREF_PREFIX = '[.snippet#';
const SNIPPET_LINE_PREFIX = '[.snippet:';
const EDIT_TAG = '[.edit]';
const EDIT_HREF_PREFIX = '[.edit#';
const UNSIGNED_RE = /^\d+$/;

export interface ParsedName {
  name: string;
  isBinary: boolean;
  snippetRef?: SnippetRef;
  editRef?: EditRef;
}

function parseLineNumber(raw: string, tag: string): number {
  const value = raw.trim();
  const line = UNSIGNED_RE.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(line)) {
    throw new TagParseError('invalid-line-number', tag, `Invalid line number: '${raw}'`);
  }
  return line;
}

function stripClosing(rest: string, tag: string): string {
  if (!rest.endsWith(']')) {
    throw new TagParseError('missing-closing-bracket', tag, "Missing closing bracket ']'");
  }
  return rest.slice(0, -1);
}

export function isSnippetTag(tag: string): boolean {
  const t = tag.trim();
  return (
    t.startsWith(SNIPPET_SHORTHAND_PREFIX) ||
    t.startsWith(SNIPPET_HREF_PREFIX) ||
    t.startsWith(SNIPPET_LINE_PREFIX)
  );
}

/**
 * Parse `[.snippet:N]`, `[.snippet#href:line]` or `[.#href:line]`.
 */
export function parseSnippetTag(input: string): SnippetRef {
  const tag = input.trim();

  let inner: string;
  let hasHref: boolean;
  if (tag.startsWith(SNIPPET_SHORTHAND_PREFIX)) {
    inner = stripClosing(tag.slice(SNIPPET_SHORTHAND_PREFIX.length), tag);
    hasHref = true;
  } else if (tag.startsWith(SNIPPET_HREF_PREFIX)) {
    inner = stripClosing(tag.slice(SNIPPET_HREF_PREFIX.length), tag);
    hasHref = true;
  } else if (tag.startsWith(SNIPPET_LINE_PREFIX)) {
    inner = stripClosing(tag.slice(SNIPPET_LINE_PREFIX.length), tag);
    hasHref = false;
  } else {
    throw new TagParseError(
      'invalid-format',
      tag,
      'Invalid snippet format. Expected [.snippet:N], [.snippet#href:line], or [.#href:line]'
    );
  }

  if (!hasHref) {
    return { line: parseLineNumber(inner, tag) };
  }

  const colon = inner.indexOf(':');
  if (colon === -1) {
    throw new TagParseError('missing-colon', tag, "Missing colon ':' in href:line");
  }
  return {
    commandHref: inner.slice(0, colon),
    line: parseLineNumber(inner.slice(colon + 1), tag),
  };
}

/**
 * Parse `[.edit]` or `[.edit#href:line]`. Returns null for anything else.
 * The edit list is filled in later from the file body.
 */
export function parseEditTag(tag: string): EditRef | null {
  if (tag === EDIT_TAG) return { edits: [] };
  if (!tag.startsWith(EDIT_HREF_PREFIX) || !tag.endsWith(']')) return null;

  const inner = tag.slice(EDIT_HREF_PREFIX.length, -1);
  const colon = inner.indexOf(':');
  if (colon === -1) return null;

  const lineText = inner.slice(colon + 1);
  if (!UNSIGNED_RE.test(lineText)) return null;
  const startLine = Number(lineText);
  if (!Number.isSafeInteger(startLine)) return null;

  return { commandHref: inner.slice(0, colon), startLine, edits: [] };
}

function applyTag(parsed: ParsedName, tag: string, strict: boolean): void {
  if (tag === BASE64_TAG) {
    parsed.isBinary = true;
    return;
  }

  if (isSnippetTag(tag)) {
    try {
      parsed.snippetRef = parseSnippetTag(tag);
    } catch (err) {
      if (strict) throw err;
    }
    return;
  }

  const editRef = parseEditTag(tag);
  if (editRef) {
    parsed.editRef = editRef;
    return;
  }

  if (strict) {
    throw new TagParseError(
      tag.startsWith('[.edit') ? 'invalid-format' : 'unknown-tag',
      tag,
      tag.startsWith('[.edit') ? `Invalid edit tag '${tag}'. Expected [.edit] or [.edit#href:line]` : `Unknown tag '${tag}'`
    );
  }
}

/**
 * Split a marker's name region into the base name and its tags.
 */
export function parseNameAndTags(namePart: string, strict = false): ParsedName {
  const firstBracket = namePart.indexOf('[');
  if (firstBracket === -1) {
    return { name: namePart.trim(), isBinary: false };
  }

  const parsed: ParsedName = { name: namePart.slice(0, firstBracket).trim(), isBinary: false };
  let rest = namePart.slice(firstBracket);

  while (rest.length > 0) {
    const open = rest.indexOf('[');
    const stray = open === -1 ? rest : rest.slice(0, open);
    if (strict && stray.trim() !== '') {
      throw new TagParseError('invalid-format', stray.trim(), `Unexpected text '${stray.trim()}' between tags`);
    }
    if (open === -1) break;

    const close = rest.indexOf(']', open);
    if (close === -1) {
      if (strict) {
        throw new TagParseError('missing-closing-bracket', rest.slice(open), "Missing closing bracket ']' in tag");
      }
      break;
    }

    applyTag(parsed, rest.slice(open, close + 1), strict);
    rest = rest.slice(close + 1);
  }

  return parsed;
}

export function formatSnippetTag(ref: SnippetRef): string {
  return ref.commandHref !== undefined
    ? `${SNIPPET_HREF_PREFIX}${ref.commandHref}:${ref.line}]`
    : `${SNIPPET_LINE_PREFIX}${ref.line}]`;
}

export function formatEditTag(ref: EditRef): string {
  if (ref.commandHref !== undefined && ref.startLine !== undefined) {
    return `${EDIT_HREF_PREFIX}${ref.commandHref}:${ref.startLine}]`;
  }
  return EDIT_TAG;
}

/**
 * Serialize a file's tags in canonical order: base64, snippet, edit.
 */
export function formatTags(file: ArchiveFile): string {
  let tags = file.isBinary ? BASE64_TAG : '';
  if (file.snippetRef) tags += formatSnippetTag(file.snippetRef);
  if (file.editRef) tags += formatEditTag(file.editRef);
  return tags;
}
