/**
 * keep_export - Export Keep notes into Markdown files
 *
 * Reads every note from the Takeout archive, renders it with front matter,
 * links and checkboxes, and writes it below the export directory.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ExportSummary, ToolResult } from '../types/index.js';
import { loadToolConfig } from './config.js';
import { createExportContext, exportNotes } from '../services/export/index.js';
import { TakeoutArchive } from '../services/keep/index.js';
import { logger } from '../utils/logger.js';

/**
 * Export output schema
 */
export interface KeepExportOutput extends ExportSummary {
  exportPath: string;
  message: string;
}

/**
 * Input validation schema
 */
const exportInputSchema = z.object({
  labels: z
    .array(z.string().min(1))
    .optional()
    .describe('Only export notes carrying at least one of these labels'),
});

// Tool definition
export const exportTool: Tool = {
  name: 'keep_export',
  description: `Export Google Keep notes into individual Markdown files.

**Layout:**
- Notes with an uppercase label go into a folder named after the first such label
- Notes without one are fragments: they go into the fragments folder, titled with their creation time
- Lowercase labels become front matter tags

**Content:**
- Front matter with created, updated, source and tags
- URLs become Markdown links, checkboxes become task list items
- Attachments are copied into the media folder and linked at the end of the note

Archived, trashed and empty notes are skipped. Duplicate titles get a timestamp suffix.`,
  inputSchema: {
    type: 'object',
    properties: {
      labels: {
        type: 'array',
        items: { type: 'string' },
        description: 'Only export notes carrying at least one of these labels',
      },
    },
  },
};

// Tool handler
export async function exportHandler(
  args: Record<string, unknown>
): Promise<ToolResult<KeepExportOutput>> {
  // Validate input
  const parseResult = exportInputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const loaded = loadToolConfig();
  if (!loaded.success) {
    return loaded;
  }
  const config = loaded.data;

  try {
    const context = createExportContext(config, new TakeoutArchive(config.takeoutPath));
    const labels = parseResult.data.labels;
    const summary = await exportNotes(context, labels ? { labels } : {});

    let message = `Exported ${summary.exported} note${summary.exported === 1 ? '' : 's'} to ${config.exportPath}`;
    if (summary.warnings.length > 0) {
      message += ` (${summary.warnings.length} warning${summary.warnings.length > 1 ? 's' : ''})`;
    }

    return {
      success: true,
      data: {
        ...summary,
        exportPath: config.exportPath,
        message,
      },
    };
  } catch (error) {
    logger.error('Export error', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'EXPORT_ERROR',
    };
  }
}
