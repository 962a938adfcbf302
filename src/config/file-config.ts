/**
 * Configuration file loading
 * Loads from KEEP_CONFIG_PATH or ~/.config/keep-export/config.yaml
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { logger, LOG_LEVEL_NAMES } from '../utils/logger.js';

// Labels may be written as a YAML list or as "a,b,c"
const labelListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')));

// Zod schema for the config file; every key is optional
const fileConfigSchema = z
  .object({
    export_path: z.string().min(1),
    media_path: z.string().min(1),
    fragments_path: z.string().min(1),
    import_path: z.string().min(1),
    import_labels: labelListSchema,
    takeout_path: z.string().min(1),
    log_level: z.enum(LOG_LEVEL_NAMES),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// Default config file path
export function getDefaultConfigPath(): string {
  return join(homedir(), '.config', 'keep-export', 'config.yaml');
}

/**
 * Load the config file, if there is one
 *
 * A missing file yields an empty config; an unreadable or invalid one throws.
 */
export function loadFileConfig(configPath: string = getDefaultConfigPath()): FileConfig {
  if (!existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}`);
    return {};
  }

  const content = readFileSync(configPath, 'utf-8');
  const rawConfig: unknown = parseYaml(content) ?? {};
  const result = fileConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid config file ${configPath}:\n${errors}`);
  }

  logger.debug(`Loaded config file from ${configPath}`);
  return result.data;
}

// Export schema for testing
export const schemas = {
  fileConfig: fileConfigSchema,
};
