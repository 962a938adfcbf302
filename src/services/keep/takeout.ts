/**
 * Google Takeout Keep archive
 *
 * A Takeout export is a flat directory of one JSON file per note, the
 * attachment files those notes reference, and an optional Labels.txt.
 * The archive serves as the note service for both directions: notes are
 * listed and attachments fetched from it, and imported notes are written
 * back into it as new JSON files.
 */

import { readFile, readdir, writeFile, copyFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join, resolve, sep, basename, extname } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { ensureDir } from '../vault/writer.js';
import { createNoteRecord } from './note-record.js';
import type {
  ListNotesOptions,
  NewNote,
  NoteRecord,
  NoteSink,
  NoteSource,
} from '../../types/index.js';

export const LABELS_FILE = 'Labels.txt';

const UNCHECKED_BOX = '☐';
const CHECKED_BOX = '☑';

// Zod schema for one note file
const takeoutNoteSchema = z.object({
  title: z.string().default(''),
  textContent: z.string().optional(),
  listContent: z
    .array(
      z.object({
        text: z.string().default(''),
        isChecked: z.boolean().default(false),
      })
    )
    .optional(),
  isArchived: z.boolean().default(false),
  isTrashed: z.boolean().default(false),
  labels: z.array(z.object({ name: z.string() })).default([]),
  attachments: z
    .array(
      z.object({
        filePath: z.string().min(1),
        mimetype: z.string().optional(),
      })
    )
    .default([]),
  createdTimestampUsec: z.number().optional(),
  userEditedTimestampUsec: z.number().optional(),
});

export type TakeoutNote = z.infer<typeof takeoutNoteSchema>;

export class UnknownLabelError extends Error {
  constructor(readonly label: string) {
    super(`Label doesn't exist: ${label} - use labels defined in ${LABELS_FILE} when importing`);
    this.name = 'UnknownLabelError';
  }
}

function usecToDate(usec: number | undefined): Date | null {
  return usec === undefined ? null : new Date(Math.floor(usec / 1000));
}

/**
 * Note text as the Keep client shows it: free text, then checklist items as
 * ☐/☑ lines. Blank checklist items are dropped.
 */
export function takeoutNoteText(note: TakeoutNote): string {
  const parts: string[] = [];

  if (note.textContent) {
    parts.push(note.textContent);
  }

  const items = (note.listContent ?? [])
    .filter((item) => item.text.trim() !== '')
    .map((item) => `${item.isChecked ? CHECKED_BOX : UNCHECKED_BOX} ${item.text}`);
  if (items.length > 0) {
    parts.push(items.join('\n'));
  }

  return parts.join('\n');
}

export function takeoutNoteToRecord(id: string, note: TakeoutNote, now?: Date): NoteRecord {
  return createNoteRecord(
    {
      id,
      title: note.title,
      text: takeoutNoteText(note),
      archived: note.isArchived,
      trashed: note.isTrashed,
      created: usecToDate(note.createdTimestampUsec),
      updated: usecToDate(note.userEditedTimestampUsec),
      labels: note.labels.map((label) => label.name),
      blobs: note.attachments.map((attachment) => attachment.filePath),
    },
    now
  );
}

export class TakeoutArchive implements NoteSource, NoteSink {
  constructor(readonly rootPath: string) {}

  /**
   * All notes in the archive, ordered by file name. With a label filter, only
   * notes carrying at least one of the labels are returned.
   */
  async listNotes(options: ListNotesOptions = {}): Promise<NoteRecord[]> {
    const files = (await readdir(this.rootPath))
      .filter((file) => extname(file).toLowerCase() === '.json')
      .sort();

    const notes: NoteRecord[] = [];

    for (const file of files) {
      const note = await this.readNoteFile(file);
      if (note) {
        notes.push(note);
      }
    }

    const labels = options.labels;
    if (!labels || labels.length === 0) {
      return notes;
    }

    const wanted = new Set(labels);
    return notes.filter((note) => note.labels.some((label) => wanted.has(label)));
  }

  private async readNoteFile(file: string): Promise<NoteRecord | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(join(this.rootPath, file), 'utf-8'));
    } catch (error) {
      logger.warn(`Skipping unreadable note file: ${file}`, error);
      return null;
    }

    const result = takeoutNoteSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      logger.warn(`Skipping invalid note file: ${file} (${issues})`);
      return null;
    }

    return takeoutNoteToRecord(basename(file, extname(file)), result.data);
  }

  /**
   * Copy an attachment out of the archive. Resolves to null when the file is
   * missing or the reference points outside the archive.
   */
  async fetchMedia(blob: string, targetDir: string, fileName: string): Promise<string | null> {
    const root = resolve(this.rootPath);
    const source = resolve(root, blob);

    if (!source.startsWith(root + sep)) {
      logger.warn(`Attachment reference outside the archive: ${blob}`);
      return null;
    }
    if (!existsSync(source)) {
      return null;
    }

    await ensureDir(targetDir);
    const target = join(targetDir, fileName);
    await copyFile(source, target);
    return target;
  }

  /**
   * Labels defined in Labels.txt, or null when the archive has none
   */
  async definedLabels(): Promise<Set<string> | null> {
    const labelsPath = join(this.rootPath, LABELS_FILE);
    if (!existsSync(labelsPath)) {
      return null;
    }

    const content = await readFile(labelsPath, 'utf-8');
    return new Set(
      content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter(Boolean)
    );
  }

  /**
   * Write a new note file with a fresh identifier.
   * @throws UnknownLabelError when Labels.txt exists and lacks one of the labels
   */
  async createNote(note: NewNote): Promise<NoteRecord> {
    const defined = await this.definedLabels();
    if (defined) {
      const unknown = note.labels.find((label) => !defined.has(label));
      if (unknown !== undefined) {
        throw new UnknownLabelError(unknown);
      }
    }

    const id = randomUUID();
    const now = new Date();
    const usec = now.getTime() * 1000;

    const takeoutNote: TakeoutNote = {
      title: note.title,
      textContent: note.text,
      isArchived: false,
      isTrashed: false,
      labels: note.labels.map((name) => ({ name })),
      attachments: [],
      createdTimestampUsec: usec,
      userEditedTimestampUsec: usec,
    };

    await ensureDir(this.rootPath);
    await writeFile(
      join(this.rootPath, `${id}.json`),
      `${JSON.stringify(takeoutNote, null, 2)}\n`,
      'utf-8'
    );
    logger.info(`Created note: ${note.title} (${id})`);

    return takeoutNoteToRecord(id, takeoutNote, now);
  }
}
