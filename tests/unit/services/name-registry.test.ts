import { describe, it, expect } from 'vitest';
import {
  NameRegistry,
  NamingExhaustedError,
  candidateTitles,
  MAX_NAME_ATTEMPTS,
} from '../../../src/services/export/name-registry.js';

const created = new Date(2024, 0, 2, 3, 4, 5);

describe('candidateTitles', () => {
  it('should try the title, then the timestamp, then counters', () => {
    const iterator = candidateTitles('Note', created);
    const first = [1, 2, 3, 4].map(() => iterator.next().value);
    expect(first).toEqual([
      'Note',
      'Note 240102030405',
      'Note 240102030405 2',
      'Note 240102030405 3',
    ]);
  });
});

describe('NameRegistry', () => {
  it('should hand out a free title unchanged', () => {
    const registry = new NameRegistry();
    expect(registry.claim('Note', created)).toBe('Note');
    expect(registry.has('Note')).toBe(true);
  });

  it('should give every duplicate a distinct title', () => {
    const registry = new NameRegistry();
    const titles = [1, 2, 3, 4].map(() => registry.claim('Note', created));

    expect(titles).toEqual([
      'Note',
      'Note 240102030405',
      'Note 240102030405 2',
      'Note 240102030405 3',
    ]);
    expect(registry.size).toBe(4);
    expect(new Set(registry.titles()).size).toBe(4);
  });

  it('should use each note creation time for the suffix', () => {
    const registry = new NameRegistry();
    registry.claim('Note', created);
    expect(registry.claim('Note', new Date(2024, 0, 3, 4, 5, 6))).toBe('Note 240103040506');
  });

  it('should skip titles taken on disk', () => {
    const registry = new NameRegistry();
    const result = registry.claim('Note', created, (title) => title === 'Note');

    expect(result).toBe('Note 240102030405');
    expect(registry.has('Note')).toBe(false);
  });

  it('should require both checks to pass', () => {
    const registry = new NameRegistry();
    registry.claim('Note', created);
    const result = registry.claim('Note', created, (title) => title === 'Note 240102030405');

    expect(result).toBe('Note 240102030405 2');
  });

  it('should stop after a bounded number of attempts', () => {
    const registry = new NameRegistry();
    let calls = 0;

    expect(() =>
      registry.claim('Note', created, () => {
        calls++;
        return true;
      })
    ).toThrow(NamingExhaustedError);
    expect(calls).toBe(MAX_NAME_ATTEMPTS);
    expect(registry.size).toBe(0);
  });

  it('should keep registries of separate runs apart', () => {
    const first = new NameRegistry();
    const second = new NameRegistry();
    first.claim('Note', created);
    expect(second.claim('Note', created)).toBe('Note');
  });
});
