export { Archive } from './archive';
export { Decoder, decodeArchive } from './decoder';
export type { DecoderOptions } from './decoder';
export { Encoder, encodeArchive } from './encoder';
export { detectEncoding, containsMarkerPattern, markerInner } from './detector';
export {
  createFile,
  createFileWithEncoding,
  isNormalFile,
  archiveName,
  parseArchiveName,
  fileText,
} from './file';
export { parseCommand, extractCommands } from './commands';
export {
  parseSnippetTag,
  parseEditTag,
  parseNameAndTags,
  formatSnippetTag,
  formatEditTag,
  formatTags,
} from './tags';
export type { ParsedName } from './tags';
export {
  parseEditBlocks,
  formatEditBlocks,
  stepEditParser,
  finishEditParser,
  INITIAL_EDIT_STATE,
} from './edit-parser';
export type { EditParserState, EditParserStep } from './edit-parser';
export { applyEdits, applyEditRef, findOccurrences, resolveEditTargets } from './edit-apply';
export { createNodeFileProbe, createSetFileProbe, EMPTY_FILE_PROBE } from './file-probe';
export { isValidUtf8, decodeUtf8 } from './bytes';
export * from './schemas';
export * from './types';
export * from './errors';
