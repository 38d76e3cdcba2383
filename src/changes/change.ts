/**
 * tierdata — Change value object
 *
 * A change declares the desired end state at one source: keys to set and
 * keys to remove. Changes are deep-copied and frozen on construction, so
 * callers may keep mutating the containers they built them from, values
 * included.
 */

import { z } from 'zod';
import type { Change, DataValue, Result, SourceId } from '../types.js';
import { malformedChange } from '../errors.js';
import { copyValue, fromPlain, toPlain, valueEquals } from '../values/value.js';
import type { PlainOptions } from '../values/value.js';

/** Shape of a change record as it appears in a changes document. */
const ChangeRecordSchema = z.object({
  source: z.string({ required_error: 'source is required' }).min(1, 'source must not be empty'),
  set: z.record(z.unknown()).nullish(),
  remove: z.array(z.string()).nullish(),
});

/**
 * Create a change. `set`, its values and `remove` are copied.
 */
export function createChange(
  source: SourceId,
  set: Iterable<readonly [string, DataValue]> = [],
  remove: Iterable<string> = [],
): Change {
  const change: Change = {
    source,
    set: new Map([...set].map(([key, value]): [string, DataValue] => [key, copyValue(value)])),
    remove: Object.freeze([...remove]),
  };
  return Object.freeze(change);
}

/**
 * Create a change from a raw record, e.g. one YAML document of a
 * changes file. A missing `set` or `remove` defaults to empty; a missing
 * record or source is MALFORMED_CHANGE.
 *
 * @param raw - The parsed record.
 * @param index - Position of the record in its document, for error messages.
 * @param options - How numbers in `set` were parsed.
 */
export function changeFromRecord(raw: unknown, index?: number, options: PlainOptions = {}): Result<Change> {
  if (raw === null || raw === undefined) {
    return { ok: false, error: malformedChange(`cannot create a change from '${String(raw)}'`, index) };
  }

  const parsed = ChangeRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue === undefined
      ? 'invalid change record'
      : `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`;
    return { ok: false, error: malformedChange(reason, index) };
  }

  const set: Array<[string, DataValue]> = [];
  for (const [key, value] of Object.entries(parsed.data.set ?? {})) {
    const converted = fromPlain(value, `set.${key}`, options);
    if (!converted.ok) {
      const reason = converted.error.code === 'INVALID_VALUE'
        ? `${converted.error.path}: ${converted.error.reason}`
        : converted.error.code;
      return { ok: false, error: malformedChange(reason, index) };
    }
    set.push([key, converted.value]);
  }

  return { ok: true, value: createChange(parsed.data.source, set, parsed.data.remove ?? []) };
}

/** Convert a change back into a plain record. */
export function changeToRecord(change: Change): { source: string; set: Record<string, unknown>; remove: string[] } {
  const set: Record<string, unknown> = {};
  for (const [key, value] of change.set) {
    set[key] = toPlain(value);
  }
  return { source: change.source, set, remove: [...change.remove] };
}

/** Structural equality of two changes. */
export function changesEqual(a: Change, b: Change): boolean {
  if (a.source !== b.source || a.set.size !== b.set.size) return false;
  if (a.remove.length !== b.remove.length) return false;
  if (a.remove.some((key, i) => b.remove[i] !== key)) return false;
  for (const [key, value] of a.set) {
    const other = b.set.get(key);
    if (other === undefined || !valueEquals(value, other)) return false;
  }
  return true;
}

/** Changes declared at `source`, in input order. */
export function findChangesForSource(source: SourceId, changes: Iterable<Change>): Change[] {
  const found: Change[] = [];
  for (const change of changes) {
    if (change.source === source) found.push(change);
  }
  return found;
}
