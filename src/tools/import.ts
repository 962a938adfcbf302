/**
 * keep_import - Create notes from the Markdown files in the import directory
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ImportSummary, ToolResult } from '../types/index.js';
import { loadToolConfig } from './config.js';
import { importNotes } from '../services/import/index.js';
import { TakeoutArchive } from '../services/keep/index.js';
import { logger } from '../utils/logger.js';

export interface KeepImportOutput extends ImportSummary {
  importPath: string;
  message: string;
}

// Tool definition
export const importTool: Tool = {
  name: 'keep_import',
  description: `Import every Markdown file in the import directory as a new Keep note.

The file name becomes the note title and front matter is dropped. A line with the
file's creation and modification times is appended, and the configured import
labels are applied to each note.`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

// Tool handler
export async function importHandler(
  _args: Record<string, unknown>
): Promise<ToolResult<KeepImportOutput>> {
  const loaded = loadToolConfig();
  if (!loaded.success) {
    return loaded;
  }
  const config = loaded.data;

  try {
    const summary = await importNotes(config, new TakeoutArchive(config.takeoutPath));

    return {
      success: true,
      data: {
        ...summary,
        importPath: config.importPath,
        message: `Imported ${summary.imported} note${summary.imported === 1 ? '' : 's'} from ${config.importPath}`,
      },
    };
  } catch (error) {
    logger.error('Import error', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'IMPORT_ERROR',
    };
  }
}
