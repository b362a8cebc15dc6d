/**
 * textar archive model types.
 *
 * Defines the data model for archives, file entries, tag metadata,
 * and edit programs.
 */

// ============================================================================
// Wire Constants
// ============================================================================

export const MARKER_PREFIX = '-- ';
export const MARKER_SUFFIX = ' --';
export const BASE64_TAG = '[.base64]';

export const SEARCH_MARKER = '<<<<<<< SEARCH';
export const SEPARATOR_MARKER = '=======';
export const REPLACE_MARKER = '>>>>>>> REPLACE';
export const INSERT_MARKER = '>>>>>>> INSERT';
export const DELETE_MARKER = '>>>>>>> DELETE';

// ============================================================================
// Encoding Detection
// ============================================================================

export type BinaryReason = 'content-conflict' | 'invalid-utf8' | 'explicit';

export type TextEncoding = 'utf-8';

export type EncodingDetection =
  | { kind: 'text'; encoding: TextEncoding }
  | { kind: 'binary'; reason: BinaryReason };

export interface EncodingConfig {
  /** Force content containing `-- name --` lines into base64 */
  readonly checkContentMarkers: boolean;
  /** Force content that is not valid UTF-8 into base64 */
  readonly validateUtf8: boolean;
}

// ============================================================================
// Tag Metadata
// ============================================================================

export interface Command {
  name: string;
  href: string;
}

export interface SnippetRef {
  commandHref?: string;
  line: number;
}

export type EditOperation = 'replace' | 'delete' | 'insert';

export interface EditBlock {
  search: string[];
  replacement: string[];
  operation: EditOperation;
}

export interface EditRef {
  commandHref?: string;
  startLine?: number;
  edits: EditBlock[];
}

// ============================================================================
// File Entries
// ============================================================================

interface FileEntryBase {
  /** Archive path, `/`-separated. Never empty. */
  name: string;
  data: Uint8Array;
  snippetRef?: SnippetRef;
  editRef?: EditRef;
}

export interface TextFile extends FileEntryBase {
  isBinary: false;
  binaryReason?: undefined;
}

export interface BinaryFile extends FileEntryBase {
  isBinary: true;
  binaryReason: BinaryReason;
}

export type ArchiveFile = TextFile | BinaryFile;

// ============================================================================
// Validation & Diagnostics
// ============================================================================

export interface SnippetRefIssue {
  file: string;
  missingCommand: string;
}

export interface DecodeWarning {
  kind: 'filename-conflict';
  file: string;
  line: number;
  message: string;
}

/**
 * Existence check the decoder issues for edit targets that are not
 * carried by the archive itself.
 */
export interface FileProbe {
  exists(name: string): boolean;
}

export type MatchPolicy = 'first' | 'unique';

export interface ResolvedEdit {
  name: string;
  source: 'archive' | 'external';
  content: string;
}
