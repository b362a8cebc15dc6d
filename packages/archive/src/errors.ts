/**
 * textar error types.
 *
 * Structured errors for model construction, decode, encode, tag parsing,
 * edit parsing, and edit application failures.
 */

export class ArchiveError extends Error {
  public readonly fileName: string | undefined;

  constructor(message: string, fileName?: string) {
    super(message);
    this.name = 'ArchiveError';
    this.fileName = fileName;
  }
}

export class ArchiveDecodeError extends Error {
  public readonly line: number | undefined;

  constructor(message: string, line?: number, cause?: unknown) {
    super(line !== undefined ? `Decode error at line ${line}: ${message}` : `Decode error: ${message}`, { cause });
    this.name = 'ArchiveDecodeError';
    this.line = line;
  }
}

export class ArchiveEncodeError extends Error {
  public readonly fileName: string;

  constructor(message: string, fileName: string) {
    super(`Encode error (${fileName}): ${message}`);
    this.name = 'ArchiveEncodeError';
    this.fileName = fileName;
  }
}

export type TagParseErrorKind =
  | 'invalid-format'
  | 'missing-closing-bracket'
  | 'missing-colon'
  | 'invalid-line-number'
  | 'unknown-tag';

export class TagParseError extends Error {
  public readonly kind: TagParseErrorKind;
  public readonly tag: string;

  constructor(kind: TagParseErrorKind, tag: string, message: string) {
    super(`Tag error [${kind}]: ${message}`);
    this.name = 'TagParseError';
    this.kind = kind;
    this.tag = tag;
  }
}

export type EditParseErrorKind =
  | 'unterminated-block'
  | 'empty-block'
  | 'malformed-line'
  | 'expected-search-start';

export class EditParseError extends Error {
  public readonly kind: EditParseErrorKind;
  public readonly line: number | undefined;

  constructor(kind: EditParseErrorKind, message: string, line?: number) {
    super(line !== undefined ? `Edit parse error at line ${line}: ${message}` : `Edit parse error: ${message}`);
    this.name = 'EditParseError';
    this.kind = kind;
    this.line = line;
  }
}

export type EditApplyErrorKind =
  | 'search-not-found'
  | 'multiple-matches'
  | 'empty-content'
  | 'invalid-utf8';

export class EditApplyError extends Error {
  public readonly kind: EditApplyErrorKind;
  public readonly editIndex: number | undefined;
  public readonly search: string | undefined;
  public readonly count: number | undefined;

  constructor(
    kind: EditApplyErrorKind,
    message: string,
    details: { editIndex?: number; search?: string; count?: number } = {}
  ) {
    super(
      details.editIndex !== undefined
        ? `Edit error [${kind}] in edit #${details.editIndex + 1}: ${message}`
        : `Edit error [${kind}]: ${message}`
    );
    this.name = 'EditApplyError';
    this.kind = kind;
    this.editIndex = details.editIndex;
    this.search = details.search;
    this.count = details.count;
  }
}
