/**
 * Document composition: front matter + body + media links for one note
 */

import { posix } from 'path';
import { formatIsoMinute } from '../../utils/dates.js';
import { titleToFilename } from '../../utils/slugify.js';
import { mediaLink } from './media-namer.js';
import type { MediaAsset, NoteRecord, RenderedDocument } from '../../types/index.js';

export const KEEP_NOTE_URL = 'https://keep.google.com/#NOTE/';

export interface ComposeInput {
  note: NoteRecord;
  title: string;
  folder: string;
  tags: readonly string[];
  body: string; // Already rewritten
  media: readonly MediaAsset[];
}

/**
 * A note whose resolved title is empty and that has no body text and no
 * attachments has nothing to export. Fragments always resolve to a title.
 */
export function isEmptyNote(
  title: string,
  note: NoteRecord,
  media: readonly MediaAsset[]
): boolean {
  return title === '' && note.text.trim() === '' && media.length === 0;
}

/**
 * Front matter block, fixed field order. Ends with a newline.
 */
export function buildFrontMatter(note: NoteRecord, tags: readonly string[]): string {
  const lines = [
    '---',
    `created: ${formatIsoMinute(note.created)}`,
    `updated: ${formatIsoMinute(note.updated)}`,
    `source: ${KEEP_NOTE_URL}${note.id}`,
  ];

  if (tags.length > 0) {
    lines.push('tags:', ...tags.map((tag) => `  - ${tag}`));
  }

  lines.push('---');
  return `${lines.join('\n')}\n`;
}

export function buildBody(text: string, media: readonly MediaAsset[]): string {
  if (media.length === 0) {
    return text;
  }

  const links = media.map(mediaLink).join('\n');
  return text ? `${text}\n\n${links}` : links;
}

export function composeDocument(input: ComposeInput): RenderedDocument {
  if (!input.title) {
    throw new Error(`Cannot compose note ${input.note.id} without a title`);
  }

  const filename = titleToFilename(input.title);
  const frontMatter = buildFrontMatter(input.note, input.tags);
  const body = buildBody(input.body, input.media);

  return {
    folder: input.folder,
    title: input.title,
    filename,
    path: posix.join(input.folder, filename),
    frontMatter,
    body,
    content: `${frontMatter}${body}\n`,
  };
}
