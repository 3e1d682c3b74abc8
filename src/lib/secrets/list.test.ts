// Path: src/lib/secrets/list.test.ts
// Unit tests for delimited list parsing

import { describe, it, expect } from 'vitest';
import { parseDelimitedList } from './list.js';

describe('parseDelimitedList', () => {
  it('should split on the delimiter and keep order', () => {
    expect(parseDelimitedList('ssh-ed25519 AAA one;ssh-rsa BBB two', ';')).toEqual([
      'ssh-ed25519 AAA one',
      'ssh-rsa BBB two',
    ]);
  });

  it('should trim items and drop empty ones', () => {
    expect(parseDelimitedList('  key-a ;; ;key-b;', ';')).toEqual(['key-a', 'key-b']);
  });

  it('should return a single item when there is no delimiter in the value', () => {
    expect(parseDelimitedList('ssh-ed25519 AAA only', ';')).toEqual(['ssh-ed25519 AAA only']);
  });

  it('should return no items for delimiters and whitespace only', () => {
    expect(parseDelimitedList(' ; ;; ', ';')).toEqual([]);
  });

  it('should return a frozen array', () => {
    const items = parseDelimitedList('a;b', ';');
    expect(Object.isFrozen(items)).toBe(true);
  });

  it('should reject an empty delimiter', () => {
    expect(() => parseDelimitedList('a;b', '')).toThrow('List delimiter cannot be empty');
  });
});
