/**
 * Export service barrel export
 */

export {
  createExportContext,
  exportNote,
  exportNotes,
  UNTITLED,
  type ExportContext,
  type NoteOutcome,
} from './exporter.js';

export { composeDocument, buildFrontMatter, buildBody, isEmptyNote, KEEP_NOTE_URL } from './composer.js';
export { resolveTitle, resolveBaseTitle, titleFromText } from './title-resolver.js';
export { classifyLabels, isFolderLabel, isTagLabel, isFragment, ROOT_FOLDER } from './label-classifier.js';
export {
  NameRegistry,
  NamingExhaustedError,
  candidateTitles,
  MAX_NAME_ATTEMPTS,
  type TitleTakenCheck,
} from './name-registry.js';
export { detectExtension, nameMedia, mediaLink, removeDownload, FALLBACK_EXTENSION } from './media-namer.js';
