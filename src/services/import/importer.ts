/**
 * Markdown import: every .md file in the import directory becomes a new note
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { parseFrontmatter } from '../../utils/frontmatter.js';
import { formatDateTime } from '../../utils/dates.js';
import { titleFromFilename } from '../../utils/slugify.js';
import { logger } from '../../utils/logger.js';
import type { ExportConfig, ImportSummary, NewNote, NoteSink } from '../../types/index.js';

/**
 * Footer recording when the source file was created and last modified
 */
export function timestampFooter(created: Date, updated: Date): string {
  return `Created: ${formatDateTime(created)}   -   Updated: ${formatDateTime(updated)}`;
}

/**
 * Build the note for one Markdown file. Front matter is dropped; the file's
 * times are appended to the text.
 */
export function markdownToNewNote(
  filename: string,
  raw: string,
  times: { created: Date; updated: Date },
  labels: string[]
): NewNote {
  const { body } = parseFrontmatter(raw);
  const footer = timestampFooter(times.created, times.updated);

  return {
    title: titleFromFilename(filename),
    text: body ? `${body}\n\n${footer}` : footer,
    labels: [...labels],
  };
}

/**
 * Regular .md files directly inside the import directory, sorted by name
 */
async function listMarkdownFiles(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.md'))
    .map((entry) => entry.name)
    .sort();
}

export async function importNotes(config: ExportConfig, sink: NoteSink): Promise<ImportSummary> {
  const summary: ImportSummary = { imported: 0, notes: [], warnings: [] };
  const files = await listMarkdownFiles(config.importPath);

  logger.info(`Importing ${files.length} notes from ${config.importPath}`);

  for (const file of files) {
    const fullPath = join(config.importPath, file);

    try {
      const [raw, stats] = await Promise.all([readFile(fullPath, 'utf-8'), stat(fullPath)]);
      const note = markdownToNewNote(
        file,
        raw,
        { created: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime, updated: stats.mtime },
        config.importLabels
      );

      logger.info(`Importing note: ${note.title} from ${file}`);
      const record = await sink.createNote(note);

      summary.imported++;
      summary.notes.push({ id: record.id, title: record.title, file });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Import failed for ${file}`, error);
      summary.warnings.push(`Import failed for ${file}: ${message}`);
    }
  }

  return summary;
}
