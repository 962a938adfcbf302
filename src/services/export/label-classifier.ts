/**
 * Label classification
 *
 * Uppercase-led labels are folders, lowercase-led labels are tags.
 * A note may carry several folder labels: the first one in label order wins
 * and the rest are ignored.
 */

import { sanitizeForFilename } from '../../utils/slugify.js';
import type { LabelClassification } from '../../types/index.js';

export const ROOT_FOLDER = '.';

export function isFolderLabel(label: string): boolean {
  return /^\p{Lu}/u.test(label);
}

export function isTagLabel(label: string): boolean {
  return /^\p{Ll}/u.test(label);
}

/**
 * A fragment is a note without any folder label
 */
export function isFragment(labels: readonly string[]): boolean {
  return !labels.some(isFolderLabel);
}

export function classifyLabels(
  labels: readonly string[],
  fragmentsFolder: string
): LabelClassification {
  const tags = labels.filter(isTagLabel);
  const folderLabel = labels.find(isFolderLabel);

  if (folderLabel !== undefined) {
    return {
      folder: sanitizeForFilename(folderLabel) || ROOT_FOLDER,
      tags,
      isFragment: false,
    };
  }

  return {
    folder: fragmentsFolder || ROOT_FOLDER,
    tags,
    isFragment: true,
  };
}
