/**
 * Byte/text helpers shared by the detector, decoder and encoder.
 */

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

export function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/**
 * Decode UTF-8, returning null when the bytes are not well-formed.
 */
export function decodeUtf8(data: Uint8Array): string | null {
  try {
    return strictDecoder.decode(data);
  } catch {
    return null;
  }
}

export function isValidUtf8(data: Uint8Array): boolean {
  return decodeUtf8(data) !== null;
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

/**
 * Strict standard-alphabet base64 (padding required). Returns null on
 * malformed input instead of silently skipping characters.
 */
export function decodeBase64(text: string): Uint8Array | null {
  if (text.length % 4 !== 0 || !BASE64_RE.test(text)) return null;
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * Split text into lines: `\n` separated, a trailing `\r` dropped from each
 * line, and no empty entry after a final newline.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}
