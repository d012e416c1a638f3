import { beforeEach, describe, expect, it } from 'vitest';
import { ObserverRegistry } from './observer-registry.js';

function keysOf(iterator: Iterable<readonly [string, number]>): string[] {
  return Array.from(iterator, ([key]) => key);
}

describe('ObserverRegistry', () => {
  let registry: ObserverRegistry<string, number>;

  beforeEach(() => {
    registry = new ObserverRegistry();
    registry.putIfAbsent('a', 1);
    registry.putIfAbsent('b', 2);
    registry.putIfAbsent('c', 3);
  });

  describe('basic operations', () => {
    it('should keep insertion order', () => {
      expect(registry.keys()).toEqual(['a', 'b', 'c']);
      expect(registry.size).toBe(3);
    });

    it('should not overwrite an existing entry', () => {
      expect(registry.putIfAbsent('b', 20)).toBe(2);
      expect(registry.get('b')).toBe(2);
      expect(registry.putIfAbsent('d', 4)).toBeUndefined();
      expect(registry.keys()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should expose eldest, newest and previous entries', () => {
      expect(registry.eldest()).toEqual(['a', 1]);
      expect(registry.newest()).toEqual(['c', 3]);
      expect(registry.previous('c')).toEqual(['b', 2]);
      expect(registry.previous('a')).toBeUndefined();
      expect(registry.previous('missing')).toBeUndefined();
    });

    it('should relink neighbours on removal', () => {
      expect(registry.remove('b')).toBe(2);
      expect(registry.remove('b')).toBeUndefined();
      expect(registry.has('b')).toBe(false);
      expect(registry.previous('c')).toEqual(['a', 1]);
      expect(registry.keys()).toEqual(['a', 'c']);

      registry.remove('a');
      registry.remove('c');
      expect(registry.eldest()).toBeUndefined();
      expect(registry.newest()).toBeUndefined();
      expect(registry.size).toBe(0);
    });

    it('should append a re-added key at the end', () => {
      registry.remove('a');
      registry.putIfAbsent('a', 10);
      expect(registry.keys()).toEqual(['b', 'c', 'a']);
    });

    it('should empty on clear', () => {
      registry.clear();
      expect(registry.size).toBe(0);
      expect(registry.keys()).toEqual([]);
    });
  });

  describe('iteratorWithAdditions', () => {
    it('should visit entries appended during traversal', () => {
      const visited: string[] = [];
      for (const [key] of registry.iteratorWithAdditions()) {
        visited.push(key);
        if (key === 'a') registry.putIfAbsent('d', 4);
      }
      expect(visited).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should skip entries removed ahead of the cursor', () => {
      const visited: string[] = [];
      for (const [key] of registry.iteratorWithAdditions()) {
        visited.push(key);
        if (key === 'a') registry.remove('b');
      }
      expect(visited).toEqual(['a', 'c']);
    });

    it('should continue after the current entry is removed', () => {
      const visited: string[] = [];
      for (const [key] of registry.iteratorWithAdditions()) {
        visited.push(key);
        if (key === 'b') registry.remove('b');
      }
      expect(visited).toEqual(['a', 'b', 'c']);
    });

    it('should reach entries appended after the removed tail it was parked on', () => {
      const visited: string[] = [];
      for (const [key] of registry.iteratorWithAdditions()) {
        visited.push(key);
        if (key === 'c') {
          registry.remove('c');
          registry.putIfAbsent('d', 4);
        }
      }
      expect(visited).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should start from the head when every visited entry is gone', () => {
      const visited: string[] = [];
      for (const [key] of registry.iteratorWithAdditions()) {
        visited.push(key);
        if (key === 'a') {
          registry.remove('a');
        }
      }
      expect(visited).toEqual(['a', 'b', 'c']);
    });
  });

  describe('descendingIterator', () => {
    it('should walk newest first', () => {
      expect(keysOf(registry.descendingIterator())).toEqual(['c', 'b', 'a']);
    });

    it('should not visit entries appended during traversal', () => {
      const visited: string[] = [];
      for (const [key] of registry.descendingIterator()) {
        visited.push(key);
        if (key === 'c') registry.putIfAbsent('d', 4);
      }
      expect(visited).toEqual(['c', 'b', 'a']);
      expect(registry.keys()).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should skip entries removed ahead of the cursor', () => {
      const visited: string[] = [];
      for (const [key] of registry.descendingIterator()) {
        visited.push(key);
        if (key === 'c') {
          registry.remove('c');
          registry.remove('b');
        }
      }
      expect(visited).toEqual(['c', 'a']);
    });
  });

  describe('ascendingIterator', () => {
    it('should be bounded to entries present at creation', () => {
      const iterator = registry.ascendingIterator();
      registry.putIfAbsent('d', 4);
      expect(keysOf(iterator)).toEqual(['a', 'b', 'c']);
    });

    it('should tolerate removal during traversal', () => {
      const visited: string[] = [];
      for (const [key] of registry) {
        visited.push(key);
        registry.remove(key);
      }
      expect(visited).toEqual(['a', 'b', 'c']);
      expect(registry.size).toBe(0);
    });
  });
});
