/**
 * NoteRecord construction
 */

import type { NoteRecord, NoteRecordInput } from '../../types/index.js';

/**
 * Build an immutable NoteRecord. Missing timestamps fall back to a single
 * "now" captured here, so created and updated agree when both are missing.
 */
export function createNoteRecord(input: NoteRecordInput, now: Date = new Date()): NoteRecord {
  if (!input.id) {
    throw new Error('Note record requires a non-empty id');
  }

  return Object.freeze({
    id: input.id,
    title: input.title ?? '',
    text: input.text ?? '',
    archived: input.archived ?? false,
    trashed: input.trashed ?? false,
    created: input.created ?? now,
    updated: input.updated ?? now,
    labels: Object.freeze([...(input.labels ?? [])]),
    blobs: Object.freeze([...(input.blobs ?? [])]),
  });
}
