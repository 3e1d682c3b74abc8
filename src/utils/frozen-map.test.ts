// Path: src/utils/frozen-map.test.ts
// Tests for the read-only Map

import { describe, it, expect } from 'vitest';
import { FrozenMap } from './frozen-map.js';

describe('FrozenMap', () => {
  it('should keep the entries it was built from', () => {
    const map = new FrozenMap([['a', 1], ['b', 2]]);
    expect([...map.entries()]).toEqual([['a', 1], ['b', 2]]);
    expect(map.get('b')).toBe(2);
  });

  it('should reject set, delete and clear', () => {
    const map = new FrozenMap([['a', 1]]);

    expect(() => map.set('c', 3)).toThrow('Map is read-only');
    expect(() => map.delete('a')).toThrow('Map is read-only');
    expect(() => map.clear()).toThrow('Map is read-only');
    expect(map.size).toBe(1);
  });
});
