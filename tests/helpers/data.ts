/**
 * tierdata — Test helpers
 *
 * Build values, snapshots, changes and hierarchies from plain data.
 */

import type { Change, DataSnapshot, DataValue, Hierarchy, Result, SourceData } from '../../src/types.js';
import { formatError } from '../../src/errors.js';
import { fromPlain, sourceDataFromPlain, sourceDataToPlain } from '../../src/values/value.js';
import { changeFromRecord } from '../../src/changes/change.js';
import { parseHierarchy } from '../../src/hierarchy/hierarchy-parser.js';

/** Return the value of a successful result; throw on failure. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(formatError(result.error));
  return result.value;
}

export function value(raw: unknown): DataValue {
  return unwrap(fromPlain(raw));
}

export function dataOf(raw: Record<string, unknown>): SourceData {
  return unwrap(sourceDataFromPlain(raw));
}

export function snapshotOf(raw: Record<string, Record<string, unknown>>): DataSnapshot {
  const snapshot = new Map<string, SourceData>();
  for (const [source, data] of Object.entries(raw)) {
    snapshot.set(source, dataOf(data));
  }
  return snapshot;
}

/** Plain view of a snapshot, convenient for toEqual. */
export function plainOf(snapshot: DataSnapshot): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = {};
  for (const [source, data] of snapshot) {
    out[source] = sourceDataToPlain(data);
  }
  return out;
}

export function changeOf(
  source: string,
  set: Record<string, unknown> = {},
  remove: string[] = [],
): Change {
  return unwrap(changeFromRecord({ source, set, remove }));
}

export function hierarchyOf(raw: unknown): Hierarchy {
  return unwrap(parseHierarchy(raw));
}

/** global → team → {dev, prod} */
export function teamHierarchy(): Hierarchy {
  return hierarchyOf({ global: { team: ['dev', 'prod'] } });
}
