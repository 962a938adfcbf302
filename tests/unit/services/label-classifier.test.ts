import { describe, it, expect } from 'vitest';
import {
  classifyLabels,
  isFolderLabel,
  isTagLabel,
  isFragment,
} from '../../../src/services/export/label-classifier.js';

describe('classifyLabels', () => {
  it('should split folder and tags', () => {
    expect(classifyLabels(['Work', 'urgent', 'work'], 'fragments')).toEqual({
      folder: 'Work',
      tags: ['urgent', 'work'],
      isFragment: false,
    });
  });

  it('should use the first folder label', () => {
    expect(classifyLabels(['Home', 'Work'], 'fragments').folder).toBe('Home');
  });

  it('should send notes without a folder label to the fragments folder', () => {
    expect(classifyLabels(['todo'], 'fragments')).toEqual({
      folder: 'fragments',
      tags: ['todo'],
      isFragment: true,
    });
  });

  it('should treat an unlabeled note as a fragment', () => {
    expect(classifyLabels([], 'fragments')).toEqual({
      folder: 'fragments',
      tags: [],
      isFragment: true,
    });
  });

  it('should use the root when no fragments folder is set', () => {
    expect(classifyLabels([], '').folder).toBe('.');
  });

  it('should ignore labels that start with neither case', () => {
    expect(classifyLabels(['2024', 'x'], 'fragments')).toEqual({
      folder: 'fragments',
      tags: ['x'],
      isFragment: true,
    });
  });

  it('should recognise non-ASCII uppercase letters', () => {
    expect(classifyLabels(['Ärger'], 'fragments').folder).toBe('Ärger');
  });

  it('should keep folder labels to one path segment', () => {
    expect(classifyLabels(['Work/Archive'], 'fragments').folder).toBe('Work-Archive');
  });
});

describe('label predicates', () => {
  it('should classify by first character', () => {
    expect(isFolderLabel('Work')).toBe(true);
    expect(isFolderLabel('work')).toBe(false);
    expect(isTagLabel('work')).toBe(true);
    expect(isTagLabel('')).toBe(false);
  });

  it('should agree with classifyLabels on fragments', () => {
    expect(isFragment(['a', 'B'])).toBe(false);
    expect(isFragment(['a', 'b'])).toBe(true);
  });
});
