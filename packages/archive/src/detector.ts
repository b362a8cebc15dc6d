/**
 * Encoding Detector — decides whether file content travels as text or base64.
 *
 * Content that contains its own `-- name --` line would be read back as a
 * file boundary, so it is classified binary ahead of the UTF-8 check.
 */

import type { EncodingConfig, EncodingDetection } from './types';
import { MARKER_PREFIX, MARKER_SUFFIX } from './types';
import { DEFAULT_ENCODING_CONFIG } from './schemas';
import { decodeUtf8, splitLines } from './bytes';

const MIN_MARKER_LENGTH = MARKER_PREFIX.length + MARKER_SUFFIX.length + 1;

/**
 * Return the region between `-- ` and ` --` when the trimmed line is a
 * marker with non-blank inner content, otherwise null.
 */
export function markerInner(line: string): string | null {
  const trimmed = line.trim();
  if (trimmed.length < MIN_MARKER_LENGTH) return null;
  if (!trimmed.startsWith(MARKER_PREFIX) || !trimmed.endsWith(MARKER_SUFFIX)) return null;

  const inner = trimmed.slice(MARKER_PREFIX.length, trimmed.length - MARKER_SUFFIX.length);
  return inner.trim() === '' ? null : inner;
}

export function containsMarkerPattern(text: string): boolean {
  return splitLines(text).some(line => markerInner(line) !== null);
}

export function detectEncoding(
  _name: string,
  data: Uint8Array,
  config: EncodingConfig = DEFAULT_ENCODING_CONFIG
): EncodingDetection {
  const text = decodeUtf8(data);

  if (config.checkContentMarkers && text !== null && containsMarkerPattern(text)) {
    return { kind: 'binary', reason: 'content-conflict' };
  }

  if (config.validateUtf8 && text === null) {
    return { kind: 'binary', reason: 'invalid-utf8' };
  }

  return { kind: 'text', encoding: 'utf-8' };
}
