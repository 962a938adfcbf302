/**
 * Title resolution
 *
 * Derives a filesystem-safe display title from a note's title, its text, or its
 * attachments. Fragments get a creation timestamp prefix so they sort by time.
 */

import { stripToAlphanumeric } from '../../utils/slugify.js';
import { formatTimestamp } from '../../utils/dates.js';
import type { MediaAsset } from '../../types/index.js';

export const MAX_DERIVED_TITLE_LENGTH = 64;

const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['.png', '.jpg']);

const PHRASE_BREAK = /[.,:;?!]/;

export interface TitleInput {
  rawTitle: string;
  text: string;
  media: readonly MediaAsset[];
  isFragment: boolean;
  created: Date;
}

/**
 * Base title before the fragment rule: title text, then attachment kind, then
 * the first phrase of the body. May be empty.
 */
export function resolveBaseTitle(input: Pick<TitleInput, 'rawTitle' | 'text' | 'media'>): string {
  const fromTitle = stripToAlphanumeric(input.rawTitle);
  if (fromTitle) {
    return fromTitle;
  }

  if (input.text.trim() === '') {
    const first = input.media[0];
    if (!first) {
      return '';
    }
    return IMAGE_EXTENSIONS.has(first.extension) ? 'Image' : 'File';
  }

  return titleFromText(input.text);
}

/**
 * First phrase of the first line, stripped and cut to 64 characters
 */
export function titleFromText(text: string): string {
  const firstLine = text.split('\n')[0] ?? '';
  const firstPhrase = firstLine.split(PHRASE_BREAK)[0] ?? '';
  return stripToAlphanumeric(firstPhrase).slice(0, MAX_DERIVED_TITLE_LENGTH).trim();
}

/**
 * Final title. Fragments are "YYMMDDHHMMSS" or "YYMMDDHHMMSS Base";
 * other notes use the base title, which can still be empty.
 */
export function resolveTitle(input: TitleInput): string {
  const base = resolveBaseTitle(input);

  if (!input.isFragment) {
    return base;
  }

  const stamp = formatTimestamp(input.created);
  return base ? `${stamp} ${base}` : stamp;
}
