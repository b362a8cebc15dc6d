/**
 * Archive Encoder — emits archive text from the in-memory model.
 *
 * Binary files are written as a single base64 line; the binary decision
 * itself was made when the file was built.
 */

import type { ArchiveFile } from './types';
import { MARKER_PREFIX, MARKER_SUFFIX } from './types';
import type { Archive } from './archive';
import { ArchiveEncodeError } from './errors';
import { decodeUtf8, encodeBase64 } from './bytes';
import { archiveName } from './file';

export class Encoder {
  encode(archive: Archive): string {
    const parts: string[] = [];

    if (archive.comment !== '') {
      parts.push(withTrailingNewline(archive.comment));
    }

    for (const file of archive.files) {
      parts.push(this.encodeFile(file));
    }

    return parts.join('');
  }

  encodeFile(file: ArchiveFile): string {
    const marker = `${MARKER_PREFIX}${archiveName(file)}${MARKER_SUFFIX}\n`;

    let content: string;
    if (file.isBinary) {
      content = encodeBase64(file.data);
    } else {
      const text = decodeUtf8(file.data);
      if (text === null) {
        throw new ArchiveEncodeError('File is not valid UTF-8 but not marked as binary', file.name);
      }
      content = text;
    }

    return marker + withTrailingNewline(content);
  }
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export function encodeArchive(archive: Archive): string {
  return new Encoder().encode(archive);
}
