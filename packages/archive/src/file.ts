/**
 * File entry construction.
 */

import type { ArchiveFile, EncodingConfig } from './types';
import { BASE64_TAG } from './types';
import { ArchiveError } from './errors';
import { DEFAULT_ENCODING_CONFIG } from './schemas';
import { detectEncoding } from './detector';
import { decodeUtf8, toBytes } from './bytes';
import { formatTags } from './tags';

function assertName(name: string): void {
  if (name.trim() === '') {
    throw new ArchiveError('File name must not be empty');
  }
}

/**
 * Build a file entry, classifying its content with the Encoding Detector.
 */
export function createFile(
  name: string,
  data: string | Uint8Array,
  config: EncodingConfig = DEFAULT_ENCODING_CONFIG
): ArchiveFile {
  assertName(name);
  const bytes = toBytes(data);
  const detection = detectEncoding(name, bytes, config);

  if (detection.kind === 'binary') {
    return { name, data: bytes, isBinary: true, binaryReason: detection.reason };
  }
  return { name, data: bytes, isBinary: false };
}

/**
 * Build a file entry with an explicit encoding decision.
 */
export function createFileWithEncoding(name: string, data: string | Uint8Array, isBinary: boolean): ArchiveFile {
  assertName(name);
  const bytes = toBytes(data);
  return isBinary
    ? { name, data: bytes, isBinary: true, binaryReason: 'explicit' }
    : { name, data: bytes, isBinary: false };
}

/** A file with neither snippet nor edit metadata. */
export function isNormalFile(file: ArchiveFile): boolean {
  return file.snippetRef === undefined && file.editRef === undefined;
}

/**
 * The name as written in the marker line, tags included.
 */
export function archiveName(file: ArchiveFile): string {
  return `${file.name}${formatTags(file)}`;
}

export function parseArchiveName(name: string): { name: string; isBinary: boolean } {
  if (name.endsWith(BASE64_TAG)) {
    return { name: name.slice(0, -BASE64_TAG.length), isBinary: true };
  }
  return { name, isBinary: false };
}

/**
 * File content as text. Throws when the bytes are not UTF-8.
 */
export function fileText(file: ArchiveFile): string {
  const text = decodeUtf8(file.data);
  if (text === null) {
    throw new ArchiveError(`File '${file.name}' is not valid UTF-8`, file.name);
  }
  return text;
}
