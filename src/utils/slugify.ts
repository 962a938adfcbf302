/**
 * Turn free text into filesystem-safe titles and filenames
 *
 * Titles keep their case and spaces so the file name reads like the note.
 */

const NOT_ALPHANUMERIC_OR_SPACE = /[^\p{L}\p{N}\s]/gu;

/**
 * Keep only letters, digits and whitespace; collapse whitespace runs and trim.
 * Letters and digits of any script are kept.
 */
export function stripToAlphanumeric(text: string): string {
  return text
    .replace(NOT_ALPHANUMERIC_OR_SPACE, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Sanitize a label or title for use as a single path segment (preserves case and spaces)
 * Only removes/replaces characters that are invalid in filenames
 */
export function sanitizeForFilename(title: string): string {
  return title
    .trim()
    .replace(/[/\\:*?"<>|]/g, '-') // Replace invalid filename chars with hyphen
    .replace(/\s+/g, ' ') // Normalize multiple spaces to single
    .replace(/-+/g, '-') // Replace multiple hyphens with single
    .replace(/^[-.]+|-+$/g, '') // No leading dots or hyphens, no trailing hyphens
    .trim();
}

/**
 * "Green Peppers" -> "Green Peppers.md"
 */
export function titleToFilename(title: string): string {
  return `${title}.md`;
}

/**
 * Extract title from filename (remove .md extension)
 */
export function titleFromFilename(filename: string): string {
  return filename.replace(/\.md$/i, '');
}
