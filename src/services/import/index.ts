/**
 * Import service barrel export
 */

export { importNotes, markdownToNewNote, timestampFooter } from './importer.js';
