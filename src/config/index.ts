/**
 * Configuration loading and validation
 *
 * Environment variables override the config file, which overrides defaults.
 * Nothing is cached: every run loads its own config and passes it along.
 */

import { z } from 'zod';
import { isAbsolute, resolve, normalize } from 'path';
import type { ExportConfig } from '../types/index.js';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';
import { loadFileConfig, getDefaultConfigPath, type FileConfig } from './file-config.js';

export const DEFAULTS = {
  exportPath: 'export',
  mediaPath: 'media',
  fragmentsPath: 'fragments',
  importPath: 'import',
  importLabels: 'my_label',
  takeoutPath: 'takeout',
  logLevel: 'info',
} as const;

// Environment variable schema
const envSchema = z.object({
  KEEP_CONFIG_PATH: z.string().optional(),
  KEEP_EXPORT_PATH: z.string().min(1).optional(),
  KEEP_MEDIA_PATH: z.string().min(1).optional(),
  KEEP_FRAGMENTS_PATH: z.string().min(1).optional(),
  KEEP_IMPORT_PATH: z.string().min(1).optional(),
  KEEP_IMPORT_LABELS: z.string().optional(),
  KEEP_TAKEOUT_PATH: z.string().min(1).optional(),
  KEEP_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
});

/**
 * A sub-path of the export directory must stay inside it
 */
export function isContainedPath(path: string): boolean {
  if (isAbsolute(path)) {
    return false;
  }
  const normalized = normalize(path).replace(/\\/g, '/');
  return normalized !== '..' && !normalized.startsWith('../');
}

const containedPath = (name: string) =>
  z.string().min(1).refine(isContainedPath, {
    message: `${name} must be a relative path inside the export directory`,
  });

// Merged settings, before paths are made absolute
const settingsSchema = z.object({
  exportPath: z.string().min(1),
  mediaPath: containedPath('media path'),
  fragmentsPath: containedPath('fragments path'),
  importPath: z.string().min(1),
  importLabels: z.array(z.string()),
  takeoutPath: z.string().min(1),
  logLevel: z.enum(LOG_LEVEL_NAMES),
});

function splitLabels(labels: readonly string[]): string[] {
  return labels.map((label) => label.trim()).filter(Boolean);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Load and validate configuration
 * @throws Error listing every problem; nothing should be exported when this fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw new Error(`Configuration error:\n${formatIssues(envResult.error)}`);
  }
  const vars = envResult.data;

  let file: FileConfig;
  try {
    file = loadFileConfig(vars.KEEP_CONFIG_PATH || getDefaultConfigPath());
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Configuration error:\n  - ${message}`);
  }

  const result = settingsSchema.safeParse({
    exportPath: vars.KEEP_EXPORT_PATH ?? file.export_path ?? DEFAULTS.exportPath,
    mediaPath: vars.KEEP_MEDIA_PATH ?? file.media_path ?? DEFAULTS.mediaPath,
    fragmentsPath: vars.KEEP_FRAGMENTS_PATH ?? file.fragments_path ?? DEFAULTS.fragmentsPath,
    importPath: vars.KEEP_IMPORT_PATH ?? file.import_path ?? DEFAULTS.importPath,
    importLabels: splitLabels(
      vars.KEEP_IMPORT_LABELS !== undefined
        ? vars.KEEP_IMPORT_LABELS.split(',')
        : (file.import_labels ?? DEFAULTS.importLabels.split(','))
    ),
    takeoutPath: vars.KEEP_TAKEOUT_PATH ?? file.takeout_path ?? DEFAULTS.takeoutPath,
    logLevel: vars.KEEP_LOG_LEVEL ?? file.log_level ?? DEFAULTS.logLevel,
  });

  if (!result.success) {
    throw new Error(`Configuration error:\n${formatIssues(result.error)}`);
  }

  const settings = result.data;

  return {
    exportPath: resolve(settings.exportPath),
    mediaPath: normalize(settings.mediaPath),
    fragmentsPath: normalize(settings.fragmentsPath),
    importPath: resolve(settings.importPath),
    importLabels: settings.importLabels,
    takeoutPath: resolve(settings.takeoutPath),
    logLevel: settings.logLevel,
  };
}

export { loadFileConfig, getDefaultConfigPath, schemas } from './file-config.js';
