/**
 * tierdata — Merger tests
 */

import { describe, it, expect } from 'vitest';
import { mergeValues, unmergeValues } from './merger.js';
import { toPlain } from '../values/value.js';
import type { DataValue, Result } from '../types.js';
import { value } from '../../tests/helpers/data.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function plain(result: Result<DataValue>): unknown {
  if (!result.ok) throw new Error(`unexpected ${result.error.code}`);
  return toPlain(result.value);
}

function merge(existing: unknown, incoming: unknown): unknown {
  return plain(mergeValues('k', value(existing), value(incoming)));
}

function unmerge(existing: unknown, subtrahend: unknown): unknown {
  return plain(unmergeValues('k', value(existing), value(subtrahend)));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('mergeValues', () => {
  it('appends sequence elements that are not already present', () => {
    expect(merge(['a', 'b'], ['b', 'c'])).toEqual(['a', 'b', 'c']);
  });

  it('does not add duplicates within the incoming sequence', () => {
    expect(merge([], ['x', 'x'])).toEqual(['x']);
  });

  it('compares sequence elements structurally', () => {
    expect(merge([{ a: 1 }], [{ a: 1 }, { a: 2 }])).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('merges mappings key-wise', () => {
    expect(merge({ a: 1 }, { b: 2 })).toEqual({ a: 1, b: 2 });
  });

  it('lets incoming scalars overwrite', () => {
    expect(merge({ a: 1, b: 1 }, { b: 2 })).toEqual({ a: 1, b: 2 });
  });

  it('recurses into nested collections of the same kind', () => {
    expect(merge({ n: { p: 1, l: ['x'] } }, { n: { q: 2, l: ['y'] } })).toEqual({
      n: { p: 1, q: 2, l: ['x', 'y'] },
    });
  });

  it('overwrites nested values of a different kind', () => {
    expect(merge({ n: ['x'] }, { n: { y: 1 } })).toEqual({ n: { y: 1 } });
  });

  it('does not modify its inputs', () => {
    const existing = value(['a']);
    mergeValues('k', existing, value(['b']));
    expect(toPlain(existing)).toEqual(['a']);
  });

  it('rejects mismatched shapes', () => {
    expect(mergeValues('tags', value(['a']), value({ b: 1 }))).toEqual({
      ok: false,
      error: {
        code: 'NOT_MERGEABLE',
        key: 'tags',
        existing: 'sequence of 1 item',
        incoming: 'mapping with keys [b]',
      },
    });
  });

  it('rejects scalars', () => {
    const result = mergeValues('color', value('blue'), value('red'));
    expect(result).toEqual({
      ok: false,
      error: { code: 'NOT_MERGEABLE', key: 'color', existing: 'string "blue"', incoming: 'string "red"' },
    });
  });
});

describe('unmergeValues', () => {
  it('removes sequence elements present in the subtrahend', () => {
    expect(unmerge(['a', 'b', 'c'], ['b', 'z'])).toEqual(['a', 'c']);
  });

  it('removes every copy of a repeated element', () => {
    expect(unmerge(['a', 'b', 'a'], ['a'])).toEqual(['b']);
  });

  it('removes mapping keys the subtrahend names', () => {
    expect(unmerge({ a: 1, b: 2 }, { b: 99 })).toEqual({ a: 1 });
  });

  it('recurses into nested collections', () => {
    expect(unmerge({ n: { p: 1, q: 2 }, l: ['x', 'y'] }, { n: { q: 2 }, l: ['y'] })).toEqual({
      n: { p: 1 },
      l: ['x'],
    });
  });

  it('drops nested collections the recursion empties', () => {
    expect(unmerge({ a: 1, n: { q: 2 } }, { n: { q: 2 } })).toEqual({ a: 1 });
  });

  it('keeps nested collections that were already empty', () => {
    expect(unmerge({ n: {} }, { n: { q: 2 } })).toEqual({ n: {} });
  });

  it('rejects mismatched shapes', () => {
    const result = unmergeValues('tags', value({ a: 1 }), value(['a']));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NOT_MERGEABLE');
  });
});

describe('merge then unmerge', () => {
  it('restores a sequence', () => {
    const start = ['a', 'b'];
    const added = ['c', 'd'];
    expect(unmerge(merge(start, added), added)).toEqual(start);
  });

  it('restores a mapping', () => {
    const start = { a: 1, n: { p: [1] } };
    const added = { b: 2, n: { q: 3 } };
    expect(unmerge(merge(start, added), added)).toEqual(start);
  });
});
