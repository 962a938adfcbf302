/**
 * Note service collaborators
 */

export {
  TakeoutArchive,
  UnknownLabelError,
  takeoutNoteText,
  takeoutNoteToRecord,
  LABELS_FILE,
  type TakeoutNote,
} from './takeout.js';
export { createNoteRecord } from './note-record.js';
