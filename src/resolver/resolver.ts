/**
 * tierdata — Resolver
 *
 * Rewrites the data of a target source and everything below it so each
 * source's effective values match the requested end state while storing
 * only what its ancestors do not already provide.
 *
 * Sources are resolved strictly root-first: each source's decisions read
 * the already-resolved data of its ancestors from the same snapshot.
 */

import type {
  Change,
  DataSnapshot,
  DataValue,
  Hierarchy,
  ResolveRequest,
  Result,
  SourceData,
  SourceId,
} from '../types.js';
import { targetNotFound } from '../errors.js';
import { createChange, findChangesForSource } from '../changes/change.js';
import { createDataLookup } from '../lookup/data-lookup.js';
import { mergeValues, unmergeValues } from '../merge/merger.js';
import { copyValue } from '../values/value.js';

/** Deep copy of a snapshot, down to every value. */
function copySnapshot(data: DataSnapshot): Map<SourceId, SourceData> {
  const copy = new Map<SourceId, SourceData>();
  for (const [source, sourceData] of data) {
    const entries = [...sourceData].map(([key, value]): [string, DataValue] => [key, copyValue(value)]);
    copy.set(source, new Map(entries));
  }
  return copy;
}

/**
 * Resolve the new own data of a single source.
 *
 * Applies the changes of every ancestor, root first, then of the source
 * itself. A value set by an ancestor's change that already reaches this
 * source through inheritance is not stored here; any copy the source held
 * is deleted, or for merge keys reduced to the parts not inherited.
 *
 * @param snapshot - The in-progress result; ancestors must already be resolved.
 * @returns The source's new data, TARGET_NOT_FOUND, or NOT_MERGEABLE.
 */
export function resolveSource(
  hierarchy: Hierarchy,
  changes: Iterable<Change>,
  source: SourceId,
  snapshot: DataSnapshot,
  mergeKeys: ReadonlySet<string>,
): Result<SourceData> {
  const ancestors = hierarchy.ancestorsOf(source);
  if (ancestors === undefined) {
    return { ok: false, error: targetNotFound(source, hierarchy.render()) };
  }

  const lookup = createDataLookup(snapshot, source, hierarchy, mergeKeys);
  if (!lookup.ok) return lookup;

  const result = new Map<string, DataValue>(snapshot.get(source) ?? []);

  for (const ancestor of ancestors) {
    for (const change of findChangesForSource(ancestor, changes)) {
      for (const [key, value] of change.set) {
        if (change.source !== source) {
          const inherited = lookup.value.isValueInherited(key, value);
          if (!inherited.ok) return inherited;

          if (inherited.value) {
            const stored = result.get(key);
            if (stored !== undefined) {
              if (mergeKeys.has(key)) {
                const unmerged = unmergeValues(key, stored, value);
                if (!unmerged.ok) return unmerged;
                const remaining = lookup.value.withoutInherited(key, unmerged.value);
                if (!remaining.ok) return remaining;
                if (remaining.value === undefined) result.delete(key);
                else result.set(key, remaining.value);
              } else {
                result.delete(key);
              }
            }
            continue;
          }
        }

        const current = result.get(key);
        if (mergeKeys.has(key) && current !== undefined) {
          const merged = mergeValues(key, current, value);
          if (!merged.ok) return merged;
          result.set(key, merged.value);
        } else {
          result.set(key, value);
        }
      }

      // Only top-level keys can be removed.
      for (const key of change.remove) {
        result.delete(key);
      }
    }
  }

  return { ok: true, value: result };
}

/**
 * Generate new data for `target` and every source beneath it.
 *
 * @param hierarchy - Which sources inherit from which.
 * @param changes - End-state changes, as if the whole tree could be rewritten.
 * @param target - Sources above it are left untouched.
 * @param data - Existing own data of each source; never mutated.
 * @param mergeKeys - Keys inherited by union across ancestors.
 * @returns A complete snapshot: every source of `data` plus the rewritten subtree.
 */
export function generateSources(
  hierarchy: Hierarchy,
  changes: Iterable<Change>,
  target: SourceId,
  data: DataSnapshot,
  mergeKeys: ReadonlySet<string>,
): Result<DataSnapshot> {
  const descendants = hierarchy.descendantsOf(target);
  if (descendants === undefined) {
    return { ok: false, error: targetNotFound(target, hierarchy.render()) };
  }

  // Materialise once so a one-shot iterable can be scanned per source,
  // copying each change so the result shares no value with the caller.
  const changeList = [...changes].map((change) => createChange(change.source, change.set, change.remove));
  const result = copySnapshot(data);

  for (const descendant of descendants) {
    const resolved = resolveSource(hierarchy, changeList, descendant, result, mergeKeys);
    if (!resolved.ok) return resolved;
    result.set(descendant, resolved.value);
  }

  return { ok: true, value: result };
}

/** Resolve a request. See {@link generateSources}. */
export function resolve(request: ResolveRequest): Result<DataSnapshot> {
  return generateSources(
    request.hierarchy,
    request.changes,
    request.target,
    request.data,
    request.mergeKeys,
  );
}
