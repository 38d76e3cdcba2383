/**
 * tierdata — Merger
 *
 * Union and difference of values stored under merge keys. Both sides
 * must be sequences or both mappings; any other pairing is NOT_MERGEABLE.
 */

import type { DataValue, MappingValue, Result, SequenceValue } from '../types.js';
import { notMergeable } from '../errors.js';
import { describeValue, includesValue, isEmptyCollection, mapping, sequence } from '../values/value.js';

// ---------------------------------------------------------------------------
// Internal: per-variant operations
// ---------------------------------------------------------------------------

function mergeSequences(existing: SequenceValue, incoming: SequenceValue): SequenceValue {
  const items = [...existing.items];
  for (const item of incoming.items) {
    if (!includesValue(items, item)) items.push(item);
  }
  return sequence(items);
}

function unmergeSequences(existing: SequenceValue, subtrahend: SequenceValue): SequenceValue {
  return sequence(existing.items.filter((item) => !includesValue(subtrahend.items, item)));
}

function mergeMappings(existing: MappingValue, incoming: MappingValue): MappingValue {
  const entries = new Map(existing.entries);
  for (const [key, value] of incoming.entries) {
    const current = entries.get(key);
    entries.set(key, current === undefined ? value : mergeNested(current, value));
  }
  return mapping(entries);
}

function unmergeMappings(existing: MappingValue, subtrahend: MappingValue): MappingValue {
  const entries = new Map(existing.entries);
  for (const [key, value] of subtrahend.entries) {
    const current = entries.get(key);
    if (current === undefined) continue;

    if (current.kind === 'sequence' && value.kind === 'sequence') {
      const remaining = unmergeSequences(current, value);
      if (isEmptyCollection(remaining) && !isEmptyCollection(current)) entries.delete(key);
      else entries.set(key, remaining);
    } else if (current.kind === 'mapping' && value.kind === 'mapping') {
      const remaining = unmergeMappings(current, value);
      if (isEmptyCollection(remaining) && !isEmptyCollection(current)) entries.delete(key);
      else entries.set(key, remaining);
    } else {
      entries.delete(key);
    }
  }
  return mapping(entries);
}

/** Nested values merge when both are the same collection kind; otherwise the incoming value wins. */
function mergeNested(current: DataValue, incoming: DataValue): DataValue {
  if (current.kind === 'sequence' && incoming.kind === 'sequence') {
    return mergeSequences(current, incoming);
  }
  if (current.kind === 'mapping' && incoming.kind === 'mapping') {
    return mergeMappings(current, incoming);
  }
  return incoming;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Union `incoming` into `existing`.
 *
 * Sequences append the elements not already present; mappings merge
 * key-wise, recursing into nested collections of the same kind.
 *
 * @param key - The merge key, reported in NOT_MERGEABLE errors.
 */
export function mergeValues(key: string, existing: DataValue, incoming: DataValue): Result<DataValue> {
  if (existing.kind === 'sequence' && incoming.kind === 'sequence') {
    return { ok: true, value: mergeSequences(existing, incoming) };
  }
  if (existing.kind === 'mapping' && incoming.kind === 'mapping') {
    return { ok: true, value: mergeMappings(existing, incoming) };
  }
  return { ok: false, error: notMergeable(key, describeValue(existing), describeValue(incoming)) };
}

/**
 * Remove `subtrahend` from `existing`.
 *
 * Sequences drop every element equal to one in the subtrahend. Mappings
 * drop each key the subtrahend names, recursing into nested collections
 * of the same kind; a nested collection the recursion empties is dropped.
 *
 * @param key - The merge key, reported in NOT_MERGEABLE errors.
 */
export function unmergeValues(key: string, existing: DataValue, subtrahend: DataValue): Result<DataValue> {
  if (existing.kind === 'sequence' && subtrahend.kind === 'sequence') {
    return { ok: true, value: unmergeSequences(existing, subtrahend) };
  }
  if (existing.kind === 'mapping' && subtrahend.kind === 'mapping') {
    return { ok: true, value: unmergeMappings(existing, subtrahend) };
  }
  return { ok: false, error: notMergeable(key, describeValue(existing), describeValue(subtrahend)) };
}
