/**
 * Export run: turns every note of a source into a Markdown file
 *
 * Notes are processed one at a time. A failure inside one note is logged and
 * recorded as a warning; it never aborts the run, and files written earlier
 * stay in place.
 */

import { join, posix } from 'path';
import { logger } from '../../utils/logger.js';
import { rewriteBody } from '../../utils/markdown.js';
import { titleToFilename } from '../../utils/slugify.js';
import { VaultWriter } from '../vault/writer.js';
import { classifyLabels } from './label-classifier.js';
import { resolveTitle } from './title-resolver.js';
import { NameRegistry } from './name-registry.js';
import { nameMedia } from './media-namer.js';
import { composeDocument, isEmptyNote } from './composer.js';
import type {
  ExportConfig,
  ExportSummary,
  ListNotesOptions,
  MediaAsset,
  NoteRecord,
  NoteSource,
  RenderedDocument,
} from '../../types/index.js';

// Used when a note has body text but nothing title-worthy in it
export const UNTITLED = 'Untitled';

/**
 * Everything one export run shares. Create a fresh context per run.
 */
export interface ExportContext {
  config: ExportConfig;
  source: NoteSource;
  registry: NameRegistry;
  writer: VaultWriter;
}

export function createExportContext(config: ExportConfig, source: NoteSource): ExportContext {
  return {
    config,
    source,
    registry: new NameRegistry(),
    writer: new VaultWriter(config.exportPath),
  };
}

export type NoteOutcome =
  | { status: 'written'; document: RenderedDocument; media: MediaAsset[] }
  | { status: 'skipped'; reason: string };

/**
 * Download and name every attachment of a note. Failed downloads are left out.
 */
async function resolveMedia(
  context: ExportContext,
  note: NoteRecord,
  warnings: string[]
): Promise<MediaAsset[]> {
  const mediaDir = join(context.config.exportPath, context.config.mediaPath);
  const assets: MediaAsset[] = [];

  for (const [index, blob] of note.blobs.entries()) {
    const baseName = `${note.id}_${index}`;

    try {
      const tempPath = await context.source.fetchMedia(blob, mediaDir, `${baseName}.dat`);
      if (!tempPath) {
        const warning = `Download of media ${blob} for note ${note.id} failed`;
        logger.warn(warning);
        warnings.push(warning);
        continue;
      }
      assets.push(await nameMedia(tempPath, blob, baseName, context.config.exportPath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const warning = `Download of media ${blob} for note ${note.id} failed: ${message}`;
      logger.warn(warning);
      warnings.push(warning);
    }
  }

  return assets;
}

/**
 * Render and write one note
 */
export async function exportNote(
  context: ExportContext,
  note: NoteRecord,
  warnings: string[] = []
): Promise<NoteOutcome> {
  if (note.archived || note.trashed) {
    return { status: 'skipped', reason: note.trashed ? 'trashed' : 'archived' };
  }

  const media = await resolveMedia(context, note, warnings);

  const { folder, tags, isFragment } = classifyLabels(note.labels, context.config.fragmentsPath);
  const resolved = resolveTitle({
    rawTitle: note.title,
    text: note.text,
    media,
    isFragment,
    created: note.created,
  });

  if (isEmptyNote(resolved, note, media)) {
    return { status: 'skipped', reason: 'empty' };
  }

  const title = resolved || UNTITLED;

  const body = rewriteBody(note.text);

  const finalTitle = context.registry.claim(title, note.created, (candidate) =>
    context.writer.exists(posix.join(folder, titleToFilename(candidate)))
  );

  const document = composeDocument({ note, title: finalTitle, folder, tags, body, media });
  await context.writer.writeDocument(document.path, document.content);

  return { status: 'written', document, media };
}

/**
 * Export every note the source lists
 */
export async function exportNotes(
  context: ExportContext,
  options: ListNotesOptions = {}
): Promise<ExportSummary> {
  const summary: ExportSummary = {
    exported: 0,
    skipped: 0,
    written: [],
    media: [],
    warnings: [],
  };

  const notes = await context.source.listNotes(options);
  logger.info(`Exporting ${notes.length} notes to ${context.config.exportPath}`);

  for (const note of notes) {
    try {
      const outcome = await exportNote(context, note, summary.warnings);

      if (outcome.status === 'skipped') {
        logger.debug(`Skipped note ${note.id} (${outcome.reason})`);
        summary.skipped++;
        continue;
      }

      logger.info(`Exported ${outcome.document.path}`);
      summary.exported++;
      summary.written.push(outcome.document.path);
      summary.media.push(...outcome.media.map((asset) => asset.relativePath));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Export failed for note ${note.id}`, error);
      summary.warnings.push(`Export failed for note ${note.id}: ${message}`);
    }
  }

  logger.info(`Total converted notes: ${summary.exported}`);
  return summary;
}
