/**
 * Shared config loading for tool handlers
 */

import { loadConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { ExportConfig, ToolResult } from '../types/index.js';

/**
 * Load config and apply its log level. Failures come back as CONFIG_ERROR
 * so a handler can stop before touching any note.
 */
export function loadToolConfig(): ToolResult<ExportConfig> {
  try {
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    return { success: true, data: config };
  } catch (error) {
    logger.error('Configuration error', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'CONFIG_ERROR',
    };
  }
}
