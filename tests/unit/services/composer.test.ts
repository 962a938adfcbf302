import { describe, it, expect } from 'vitest';
import {
  composeDocument,
  buildFrontMatter,
  buildBody,
  isEmptyNote,
} from '../../../src/services/export/composer.js';
import { createNoteRecord } from '../../../src/services/keep/note-record.js';
import type { MediaAsset } from '../../../src/types/index.js';

const note = createNoteRecord({
  id: 'abc',
  title: 'Trip',
  text: 'Hello',
  created: new Date(2024, 0, 2, 3, 4, 5),
  updated: new Date(2024, 0, 3, 10, 20, 30),
  labels: ['Work', 'urgent'],
});

const png: MediaAsset = {
  blob: 'b0',
  baseName: 'abc_0',
  extension: '.png',
  relativePath: 'media/abc_0.png',
};

const audio: MediaAsset = {
  blob: 'b1',
  baseName: 'abc_1',
  extension: '.m4a',
  relativePath: 'media/abc_1.m4a',
};

describe('buildFrontMatter', () => {
  it('should list fields in fixed order with tags last', () => {
    expect(buildFrontMatter(note, ['urgent', 'later'])).toBe(
      '---\n' +
        'created: 2024-01-02T03:04\n' +
        'updated: 2024-01-03T10:20\n' +
        'source: https://keep.google.com/#NOTE/abc\n' +
        'tags:\n' +
        '  - urgent\n' +
        '  - later\n' +
        '---\n'
    );
  });

  it('should omit the tags block without tags', () => {
    expect(buildFrontMatter(note, [])).toBe(
      '---\n' +
        'created: 2024-01-02T03:04\n' +
        'updated: 2024-01-03T10:20\n' +
        'source: https://keep.google.com/#NOTE/abc\n' +
        '---\n'
    );
  });
});

describe('buildBody', () => {
  it('should return the text alone without media', () => {
    expect(buildBody('Hello', [])).toBe('Hello');
  });

  it('should put one link per asset after a blank line', () => {
    expect(buildBody('Hello', [png, audio])).toBe(
      'Hello\n\n![media/abc_0.png](media/abc_0.png)\n![media/abc_1.m4a](media/abc_1.m4a)'
    );
  });

  it('should list only links when there is no text', () => {
    expect(buildBody('', [png])).toBe('![media/abc_0.png](media/abc_0.png)');
  });
});

describe('composeDocument', () => {
  it('should render the full document', () => {
    const document = composeDocument({
      note,
      title: 'Trip',
      folder: 'Work',
      tags: ['urgent'],
      body: 'Hello',
      media: [png],
    });

    expect(document.filename).toBe('Trip.md');
    expect(document.path).toBe('Work/Trip.md');
    expect(document.body).toBe('Hello\n\n![media/abc_0.png](media/abc_0.png)');
    expect(document.content).toBe(
      '---\n' +
        'created: 2024-01-02T03:04\n' +
        'updated: 2024-01-03T10:20\n' +
        'source: https://keep.google.com/#NOTE/abc\n' +
        'tags:\n' +
        '  - urgent\n' +
        '---\n' +
        'Hello\n\n![media/abc_0.png](media/abc_0.png)\n'
    );
  });

  it('should place root notes without a folder prefix', () => {
    const document = composeDocument({ note, title: 'Trip', folder: '.', tags: [], body: 'Hello', media: [] });
    expect(document.path).toBe('Trip.md');
  });

  it('should refuse an empty title', () => {
    expect(() =>
      composeDocument({ note, title: '', folder: '.', tags: [], body: 'Hello', media: [] })
    ).toThrow('without a title');
  });
});

describe('isEmptyNote', () => {
  it('should detect notes with nothing to export', () => {
    const empty = createNoteRecord({ id: 'e', title: '!!!', text: '\n' });
    expect(isEmptyNote('', empty, [])).toBe(true);
  });

  it('should keep notes that resolved to a title', () => {
    const fragment = createNoteRecord({ id: 'e' });
    expect(isEmptyNote('240102030405', fragment, [])).toBe(false);
  });

  it('should count attachments as content', () => {
    const empty = createNoteRecord({ id: 'e' });
    expect(isEmptyNote('', empty, [png])).toBe(false);
  });

  it('should count text as content', () => {
    expect(isEmptyNote('', note, [])).toBe(false);
  });
});
