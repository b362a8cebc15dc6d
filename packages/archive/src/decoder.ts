/**
 * Archive Decoder — tokenizes archive text into comment, files and tags.
 *
 * Outside any file, lines accumulate into the comment; after a marker they
 * accumulate into the current file until the next marker. Edit programs
 * are parsed only once the whole stream is read, because an edit file may
 * precede the file it targets.
 */

import type { ArchiveFile, DecodeWarning, EditRef, FileProbe, SnippetRef } from './types';
import type { DecodeConfigInput } from './schemas';
import { DecodeConfigSchema } from './schemas';
import { Archive } from './archive';
import { ArchiveDecodeError, ArchiveError, EditParseError, TagParseError } from './errors';
import { decodeBase64, decodeUtf8, splitLines, toBytes } from './bytes';
import { markerInner } from './detector';
import type { ParsedName } from './tags';
import { parseNameAndTags } from './tags';
import { parseEditBlocks } from './edit-parser';
import { EMPTY_FILE_PROBE } from './file-probe';

export interface DecoderOptions extends DecodeConfigInput {
  /** Consulted for edit targets the archive does not carry. */
  fileProbe?: FileProbe;
  /** Receives advisory diagnostics; decoding continues. */
  onWarning?: (warning: DecodeWarning) => void;
}

interface PendingFile {
  name: string;
  isBinary: boolean;
  snippetRef?: SnippetRef;
  editRef?: EditRef;
  lines: string[];
  markerLine: number;
}

type DecoderState =
  | { kind: 'comment' }
  | { kind: 'file'; file: PendingFile };

export class Decoder {
  private readonly strictTags: boolean;
  private readonly fileProbe: FileProbe;
  private readonly onWarning: ((warning: DecodeWarning) => void) | undefined;

  constructor(options: DecoderOptions = {}) {
    const config = DecodeConfigSchema.parse({ strictTags: options.strictTags });
    this.strictTags = config.strictTags;
    this.fileProbe = options.fileProbe ?? EMPTY_FILE_PROBE;
    this.onWarning = options.onWarning;
  }

  decode(input: string): Archive {
    const archive = new Archive();
    const commentLines: string[] = [];
    const markerLines = new Map<ArchiveFile, number>();
    let state: DecoderState = { kind: 'comment' };

    const lines = splitLines(input);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const lineNumber = i + 1;

      const marker = this.parseMarker(line, lineNumber);
      if (marker) {
        if (state.kind === 'file') {
          this.addFinalized(archive, state.file, markerLines);
        }
        state = { kind: 'file', file: marker };
        continue;
      }

      if (state.kind === 'comment') {
        // Blank lines before any comment text are dropped
        if (commentLines.length > 0 || line.trim() !== '') {
          commentLines.push(line);
        }
      } else if (!state.file.isBinary) {
        state.file.lines.push(line);
      } else if (line.trim() !== '') {
        state.file.lines.push(line);
      }
    }

    if (state.kind === 'file') {
      this.addFinalized(archive, state.file, markerLines);
    }

    while (commentLines.length > 0 && commentLines[commentLines.length - 1].trim() === '') {
      commentLines.pop();
    }
    archive.setComment(commentLines.join('\n'));

    this.parseAndValidateEdits(archive, markerLines);

    return archive;
  }

  private parseMarker(line: string, lineNumber: number): PendingFile | null {
    const inner = markerInner(line);
    if (inner === null) return null;

    let parsed: ParsedName;
    try {
      parsed = parseNameAndTags(inner, this.strictTags);
    } catch (err) {
      if (err instanceof TagParseError) {
        throw new ArchiveDecodeError(err.message, lineNumber, err);
      }
      throw err;
    }

    if (parsed.name === '') {
      throw new ArchiveDecodeError(`Empty file name in marker '${line.trim()}'`, lineNumber);
    }

    if (!parsed.isBinary && parsed.name.includes('-- ') && parsed.name.includes(' --')) {
      this.onWarning?.({
        kind: 'filename-conflict',
        file: parsed.name,
        line: lineNumber,
        message: `Filename '${parsed.name}' contains a marker pattern but is not marked as binary`,
      });
    }

    return { ...parsed, lines: [], markerLine: lineNumber };
  }

  private finalize(pending: PendingFile): ArchiveFile {
    const { name, snippetRef, editRef } = pending;
    const meta = {
      ...(snippetRef ? { snippetRef } : {}),
      ...(editRef ? { editRef } : {}),
    };

    if (pending.isBinary) {
      const encoded = pending.lines.join('').replace(/[\r\n]/g, '');
      const data = decodeBase64(encoded);
      if (data === null) {
        throw new ArchiveDecodeError(`Failed to decode base64 for file '${name}'`, pending.markerLine);
      }
      return { name, data, isBinary: true, binaryReason: 'explicit', ...meta };
    }

    let text = pending.lines.map(l => `${l}\n`).join('');
    if (text.endsWith('\n')) text = text.slice(0, -1);
    return { name, data: toBytes(text), isBinary: false, ...meta };
  }

  private addFinalized(archive: Archive, pending: PendingFile, markerLines: Map<ArchiveFile, number>): void {
    const file = this.finalize(pending);
    try {
      archive.addFile(file);
    } catch (err) {
      if (err instanceof ArchiveError) {
        throw new ArchiveDecodeError(err.message, pending.markerLine, err);
      }
      throw err;
    }
    markerLines.set(file, pending.markerLine);
  }

  private parseAndValidateEdits(archive: Archive, markerLines: Map<ArchiveFile, number>): void {
    const editFiles = archive.files.filter(f => f.editRef !== undefined);

    for (const file of editFiles) {
      if (archive.findFile(file.name) === undefined && !this.fileProbe.exists(file.name)) {
        throw new ArchiveDecodeError(
          `Edit target file '${file.name}' not found in archive or filesystem (at least one must exist)`,
          markerLines.get(file)
        );
      }
    }

    for (const file of editFiles) {
      const markerLine = markerLines.get(file);
      const body = decodeUtf8(file.data);
      if (body === null) {
        throw new ArchiveDecodeError(`File '${file.name}' is not valid UTF-8`, markerLine);
      }

      try {
        // The tag created this EditRef during this decode; its edits are filled in here.
        if (file.editRef) file.editRef.edits = parseEditBlocks(body);
      } catch (err) {
        const bodyLine = err instanceof EditParseError ? err.line : undefined;
        const line = markerLine !== undefined && bodyLine !== undefined ? markerLine + bodyLine : markerLine;
        const msg = err instanceof Error ? err.message : String(err);
        throw new ArchiveDecodeError(`Failed to parse edit blocks in '${file.name}': ${msg}`, line, err);
      }
    }
  }
}

export function decodeArchive(input: string, options: DecoderOptions = {}): Archive {
  return new Decoder(options).decode(input);
}
