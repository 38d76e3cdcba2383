/**
 * tierdata — Data lookup
 *
 * Answers inheritance questions for one source against a snapshot: what
 * the source would receive from its ancestors alone, what it ends up with,
 * and whether a value would reach it without being stored there.
 *
 * Non-merge keys inherit the nearest ancestor's value. Merge keys inherit
 * the union of every ancestor's value, root first.
 */

import type {
  DataSnapshot,
  DataValue,
  Hierarchy,
  Result,
  SourceData,
  SourceId,
} from '../types.js';
import { targetNotFound } from '../errors.js';
import { mergeValues } from '../merge/merger.js';
import { includesValue, isEmptyCollection, mapping, sequence, valueEquals } from '../values/value.js';

/** Inheritance queries bound to one source of one snapshot. */
export interface DataLookup {
  readonly source: SourceId;

  /**
   * Whether `candidate` would reach this source through inheritance alone.
   * For merge keys, whether the ancestors' union already contains it.
   */
  isValueInherited(key: string, candidate: DataValue): Result<boolean>;

  /** The value this source would have for `key` with no data of its own. */
  inheritedValue(key: string): Result<DataValue | undefined>;

  /** The value this source ends up with for `key`. */
  effectiveValue(key: string): Result<DataValue | undefined>;

  /** Every key this source ends up with, flattened across its ancestry. */
  effectiveData(): Result<SourceData>;

  /** The parts of `value` the ancestors do not already provide; undefined when none remain. */
  withoutInherited(key: string, value: DataValue): Result<DataValue | undefined>;
}

// ---------------------------------------------------------------------------
// Internal: containment & subtraction
// ---------------------------------------------------------------------------

/**
 * Whether `container` already holds `candidate`. Sequences test element
 * membership; mappings test key-wise containment, recursing into nested
 * collections of the same kind and comparing anything else for equality.
 */
function containsValue(container: DataValue, candidate: DataValue): boolean {
  if (container.kind === 'sequence' && candidate.kind === 'sequence') {
    return candidate.items.every((item) => includesValue(container.items, item));
  }
  if (container.kind === 'mapping' && candidate.kind === 'mapping') {
    for (const [key, value] of candidate.entries) {
      const held = container.entries.get(key);
      if (held === undefined) return false;
      const sameCollection =
        (held.kind === 'sequence' && value.kind === 'sequence') ||
        (held.kind === 'mapping' && value.kind === 'mapping');
      if (sameCollection ? !containsValue(held, value) : !valueEquals(held, value)) return false;
    }
    return true;
  }
  return valueEquals(container, candidate);
}

/** The parts of `value` not contained in `inherited`; undefined when nothing remains. */
function subtractInherited(value: DataValue, inherited: DataValue): DataValue | undefined {
  if (value.kind === 'sequence' && inherited.kind === 'sequence') {
    const remaining = value.items.filter((item) => !includesValue(inherited.items, item));
    return remaining.length === 0 ? undefined : sequence(remaining);
  }
  if (value.kind === 'mapping' && inherited.kind === 'mapping') {
    const remaining = new Map<string, DataValue>();
    for (const [key, entry] of value.entries) {
      const held = inherited.entries.get(key);
      if (held === undefined) {
        remaining.set(key, entry);
        continue;
      }
      const rest = subtractInherited(entry, held);
      if (rest !== undefined) remaining.set(key, rest);
    }
    return remaining.size === 0 ? undefined : mapping(remaining);
  }
  return valueEquals(value, inherited) ? undefined : value;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Create a lookup for `source`.
 *
 * The lookup reads `snapshot` on every call, so it observes updates the
 * caller makes to that snapshot after construction.
 *
 * @returns The lookup, or TARGET_NOT_FOUND when `source` is not in the hierarchy.
 */
export function createDataLookup(
  snapshot: DataSnapshot,
  source: SourceId,
  hierarchy: Hierarchy,
  mergeKeys: ReadonlySet<string>,
): Result<DataLookup> {
  const ancestry = hierarchy.ancestorsOf(source);
  if (ancestry === undefined) {
    return { ok: false, error: targetNotFound(source, hierarchy.render()) };
  }
  const ancestors = ancestry.slice(0, -1);

  function valueAt(at: SourceId, key: string): DataValue | undefined {
    return snapshot.get(at)?.get(key);
  }

  function inheritedValue(key: string): Result<DataValue | undefined> {
    if (!mergeKeys.has(key)) {
      for (let i = ancestors.length - 1; i >= 0; i--) {
        const at = ancestors[i];
        if (at === undefined) continue;
        const value = valueAt(at, key);
        if (value !== undefined) return { ok: true, value };
      }
      return { ok: true, value: undefined };
    }

    let union: DataValue | undefined;
    for (const at of ancestors) {
      const value = valueAt(at, key);
      if (value === undefined) continue;
      if (union === undefined) {
        union = value;
        continue;
      }
      const merged = mergeValues(key, union, value);
      if (!merged.ok) return merged;
      union = merged.value;
    }
    return { ok: true, value: union };
  }

  function effectiveValue(key: string): Result<DataValue | undefined> {
    const own = valueAt(source, key);
    if (!mergeKeys.has(key)) {
      return own !== undefined ? { ok: true, value: own } : inheritedValue(key);
    }

    const inherited = inheritedValue(key);
    if (!inherited.ok) return inherited;
    if (inherited.value === undefined) return { ok: true, value: own };
    if (own === undefined) return inherited;
    return mergeValues(key, inherited.value, own);
  }

  return {
    ok: true,
    value: {
      source,

      isValueInherited(key: string, candidate: DataValue): Result<boolean> {
        const inherited = inheritedValue(key);
        if (!inherited.ok) return inherited;
        if (inherited.value === undefined) return { ok: true, value: false };
        return {
          ok: true,
          value: mergeKeys.has(key)
            ? containsValue(inherited.value, candidate)
            : valueEquals(inherited.value, candidate),
        };
      },

      inheritedValue,

      effectiveValue,

      effectiveData(): Result<SourceData> {
        const keys = new Set<string>();
        for (const at of ancestry) {
          for (const key of snapshot.get(at)?.keys() ?? []) keys.add(key);
        }
        const data = new Map<string, DataValue>();
        for (const key of keys) {
          const value = effectiveValue(key);
          if (!value.ok) return value;
          if (value.value !== undefined) data.set(key, value.value);
        }
        return { ok: true, value: data };
      },

      withoutInherited(key: string, value: DataValue): Result<DataValue | undefined> {
        const inherited = inheritedValue(key);
        if (!inherited.ok) return inherited;
        if (inherited.value === undefined) {
          return { ok: true, value: mergeKeys.has(key) && isEmptyCollection(value) ? undefined : value };
        }
        if (!mergeKeys.has(key)) {
          return { ok: true, value: valueEquals(inherited.value, value) ? undefined : value };
        }
        return { ok: true, value: subtractInherited(value, inherited.value) };
      },
    },
  };
}
