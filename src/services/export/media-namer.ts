/**
 * Media naming
 *
 * Attachments arrive as untyped downloads. The file extension is chosen from
 * the content signature; anything unrecognised is treated as a voice memo.
 */

import { open, copyFile, rm } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';
import { formatLink } from '../../utils/markdown.js';
import type { MediaAsset, MediaExtension } from '../../types/index.js';

export const FALLBACK_EXTENSION: MediaExtension = '.m4a';

// Enough bytes for every signature below
const HEADER_LENGTH = 12;

interface Signature {
  extension: MediaExtension;
  matches: (header: Uint8Array) => boolean;
}

function startsWith(header: Uint8Array, bytes: readonly number[], offset = 0): boolean {
  return bytes.every((byte, i) => header[offset + i] === byte);
}

function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

// Checked in this order
const SIGNATURES: readonly Signature[] = [
  {
    extension: '.png',
    matches: (h) => startsWith(h, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  {
    extension: '.jpg',
    matches: (h) => startsWith(h, [0xff, 0xd8, 0xff]),
  },
  {
    extension: '.gif',
    matches: (h) => startsWith(h, ascii('GIF87a')) || startsWith(h, ascii('GIF89a')),
  },
  {
    extension: '.webp',
    matches: (h) => startsWith(h, ascii('RIFF')) && startsWith(h, ascii('WEBP'), 8),
  },
];

export function detectExtension(header: Uint8Array): MediaExtension {
  const signature = SIGNATURES.find((s) => s.matches(header));
  return signature ? signature.extension : FALLBACK_EXTENSION;
}

async function readHeader(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead } = await handle.read(buffer, 0, HEADER_LENGTH, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Remove a temp download. A file that is already gone is not an error.
 */
export async function removeDownload(tempPath: string): Promise<void> {
  await rm(tempPath, { force: true });
}

/**
 * Give a downloaded temp file its final name ({baseName}{extension}, same
 * directory) and remove the temp file. Removing an already missing temp file
 * is not an error.
 */
export async function nameMedia(
  tempPath: string,
  blob: string,
  baseName: string,
  exportPath: string
): Promise<MediaAsset> {
  const extension = detectExtension(await readHeader(tempPath));
  const finalPath = join(dirname(tempPath), `${baseName}${extension}`);

  if (finalPath !== tempPath) {
    await copyFile(tempPath, finalPath);
    await removeDownload(tempPath);
  }

  return {
    blob,
    baseName,
    extension,
    relativePath: relative(exportPath, finalPath).split(sep).join('/'),
  };
}

/**
 * Inline Markdown link for a media asset
 */
export function mediaLink(asset: MediaAsset): string {
  return formatLink(asset.relativePath, { media: true });
}
