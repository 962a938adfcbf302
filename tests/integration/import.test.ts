/**
 * Integration test: import Markdown files, then export them again
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'path';
import { mkdir, rm, writeFile, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { importNotes } from '../../src/services/import/index.js';
import { createExportContext, exportNotes } from '../../src/services/export/index.js';
import { TakeoutArchive, LABELS_FILE } from '../../src/services/keep/index.js';
import { logger } from '../../src/utils/logger.js';
import type { ExportConfig } from '../../src/types/index.js';

const testDir = join(tmpdir(), `keep-import-int-test-${randomUUID()}`);

const config: ExportConfig = {
  exportPath: join(testDir, 'export'),
  mediaPath: 'media',
  fragmentsPath: 'fragments',
  importPath: join(testDir, 'import'),
  importLabels: ['my_label'],
  takeoutPath: join(testDir, 'takeout'),
  logLevel: 'error',
};

describe('import then export', () => {
  beforeAll(async () => {
    logger.setLevel('error');
    await mkdir(config.importPath, { recursive: true });
    await mkdir(config.takeoutPath, { recursive: true });
    await writeFile(join(config.takeoutPath, LABELS_FILE), 'my_label\nWork\n');
    await writeFile(
      join(config.importPath, 'Trip.md'),
      '---\ncreated: 2024-01-02T03:04\n---\nPack bags ☐ passport\n'
    );
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('round-trips a markdown file through the archive', async () => {
    const archive = new TakeoutArchive(config.takeoutPath);

    const imported = await importNotes(config, archive);
    expect(imported.imported).toBe(1);
    expect(imported.warnings).toEqual([]);

    const exported = await exportNotes(createExportContext(config, archive));
    expect(exported.exported).toBe(1);

    const path = exported.written[0] ?? '';
    expect(path).toMatch(/^fragments\/\d{12} Trip\.md$/);

    const content = await readFile(join(config.exportPath, path), 'utf-8');
    expect(content).toContain('tags:\n  - my_label\n');
    expect(content).toContain('Pack bags - [ ] passport\n\nCreated: ');
  });
});
