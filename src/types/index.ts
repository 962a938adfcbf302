/**
 * Keep Notes Exporter - Type Definitions
 */

import type { LogLevel } from '../utils/logger.js';

// Raw note as delivered by the note service
export interface NoteRecord {
  readonly id: string;
  readonly title: string;
  readonly text: string;
  readonly archived: boolean;
  readonly trashed: boolean;
  readonly created: Date;
  readonly updated: Date;
  readonly labels: readonly string[];
  readonly blobs: readonly string[]; // Attachment references, source specific
}

// Fields a source may leave out when building a NoteRecord
export interface NoteRecordInput {
  id: string;
  title?: string;
  text?: string;
  archived?: boolean;
  trashed?: boolean;
  created?: Date | null;
  updated?: Date | null;
  labels?: readonly string[];
  blobs?: readonly string[];
}

export type MediaExtension = '.png' | '.jpg' | '.gif' | '.webp' | '.m4a';

// Attachment after download and naming
export interface MediaAsset {
  readonly blob: string;
  readonly baseName: string; // {note_id}_{attachment_index}
  readonly extension: MediaExtension;
  readonly relativePath: string; // Relative to export root, POSIX separators
}

// Fully rendered note, ready to be written
export interface RenderedDocument {
  folder: string;
  title: string;
  filename: string;
  path: string; // folder/filename
  frontMatter: string;
  body: string;
  content: string; // Full file text
}

// Result of splitting a note's labels
export interface LabelClassification {
  folder: string;
  tags: string[];
  isFragment: boolean;
}

// Runtime configuration for one export or import run
export interface ExportConfig {
  exportPath: string;
  mediaPath: string; // Relative to exportPath
  fragmentsPath: string; // Relative to exportPath
  importPath: string;
  importLabels: string[];
  takeoutPath: string;
  logLevel: LogLevel;
}

// Note service collaborator: read side
export interface ListNotesOptions {
  labels?: string[];
}

export interface NoteSource {
  listNotes(options?: ListNotesOptions): Promise<NoteRecord[]>;
  /**
   * Download one attachment into targetDir/fileName.
   * Resolves to the written path, or null when the service has no media for the blob.
   */
  fetchMedia(blob: string, targetDir: string, fileName: string): Promise<string | null>;
}

// Note service collaborator: write side
export interface NewNote {
  title: string;
  text: string;
  labels: string[];
}

export interface NoteSink {
  createNote(note: NewNote): Promise<NoteRecord>;
}

// Export run summary
export interface ExportSummary {
  exported: number;
  skipped: number;
  written: string[];
  media: string[];
  warnings: string[];
}

// Import run summary
export interface ImportSummary {
  imported: number;
  notes: Array<{ id: string; title: string; file: string }>;
  warnings: string[];
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;
