/**
 * tierdata — Data values
 *
 * Constructors, conversion from and to plain YAML/JSON data, structural
 * equality and shape descriptions for the DataValue variant. Values built
 * here are frozen; anything else is rebuilt with `copyValue` before it is
 * kept.
 *
 * Integers are `bigint` and a `number` is a float, so `2` and `2.0` stay
 * apart and integers beyond 2^53 keep every digit.
 */

import type {
  DataValue,
  MappingValue,
  Result,
  ScalarPrimitive,
  ScalarValue,
  SequenceValue,
  SourceData,
} from '../types.js';
import { invalidValue } from '../errors.js';

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** Build a scalar value. */
export function scalar(value: ScalarPrimitive): ScalarValue {
  const built: ScalarValue = { kind: 'scalar', value };
  return Object.freeze(built);
}

/** Build a sequence value from already-built items. */
export function sequence(items: Iterable<DataValue>): SequenceValue {
  const built: SequenceValue = { kind: 'sequence', items: Object.freeze([...items]) };
  return Object.freeze(built);
}

/** Build a mapping value from already-built entries. */
export function mapping(entries: Iterable<readonly [string, DataValue]>): MappingValue {
  const built: MappingValue = { kind: 'mapping', entries: new Map(entries) };
  return Object.freeze(built);
}

/**
 * Deep copy of a value through the constructors above. The result shares
 * nothing with `value`, which may be a caller-built object over mutable
 * containers.
 */
export function copyValue(value: DataValue): DataValue {
  switch (value.kind) {
    case 'scalar':
      return scalar(value.value);
    case 'sequence':
      return sequence(value.items.map(copyValue));
    case 'mapping':
      return mapping([...value.entries].map(([key, entry]): [string, DataValue] => [key, copyValue(entry)]));
  }
}

/** True when a collection holds nothing. Scalars are never empty. */
export function isEmptyCollection(value: DataValue): boolean {
  switch (value.kind) {
    case 'scalar':
      return false;
    case 'sequence':
      return value.items.length === 0;
    case 'mapping':
      return value.entries.size === 0;
  }
}

// ---------------------------------------------------------------------------
// Plain data conversion
// ---------------------------------------------------------------------------

/** How numbers are read from and written to plain data. */
export interface PlainOptions {
  /**
   * The data came from a parser run with `intAsBigInt`: every integer is
   * already a bigint, so a number is a float even when its value is
   * integral (`1.0`). Otherwise integral numbers are read as integers,
   * and integers within the safe range are written back as numbers.
   */
  readonly integersAsBigInt?: boolean | undefined;
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return false;
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert parsed YAML/JSON data into a DataValue.
 * `path` locates the value in error messages.
 */
export function fromPlain(raw: unknown, path = '$', options: PlainOptions = {}): Result<DataValue> {
  if (typeof raw === 'number') {
    const integral = options.integersAsBigInt !== true && Number.isSafeInteger(raw);
    return { ok: true, value: scalar(integral ? BigInt(raw) : raw) };
  }

  if (
    raw === null ||
    typeof raw === 'string' ||
    typeof raw === 'boolean' ||
    typeof raw === 'bigint'
  ) {
    return { ok: true, value: scalar(raw) };
  }

  if (Array.isArray(raw)) {
    const items: DataValue[] = [];
    for (let i = 0; i < raw.length; i++) {
      const item = fromPlain(raw[i], `${path}[${String(i)}]`, options);
      if (!item.ok) return item;
      items.push(item.value);
    }
    return { ok: true, value: sequence(items) };
  }

  if (raw instanceof Map) {
    const entries: Array<[string, DataValue]> = [];
    for (const [key, entry] of raw) {
      if (typeof key !== 'string') {
        return { ok: false, error: invalidValue(path, `mapping key ${String(key)} is not a string`) };
      }
      const converted = fromPlain(entry, `${path}.${key}`, options);
      if (!converted.ok) return converted;
      entries.push([key, converted.value]);
    }
    return { ok: true, value: mapping(entries) };
  }

  if (isPlainObject(raw)) {
    const entries: Array<[string, DataValue]> = [];
    for (const [key, entry] of Object.entries(raw)) {
      const converted = fromPlain(entry, `${path}.${key}`, options);
      if (!converted.ok) return converted;
      entries.push([key, converted.value]);
    }
    return { ok: true, value: mapping(entries) };
  }

  return {
    ok: false,
    error: invalidValue(path, `unsupported value of type ${raw instanceof Date ? 'date' : typeof raw}`),
  };
}

function plainScalar(value: ScalarPrimitive, options: PlainOptions): ScalarPrimitive {
  if (typeof value !== 'bigint' || options.integersAsBigInt === true) return value;
  return value <= MAX_SAFE && value >= -MAX_SAFE ? Number(value) : value;
}

/**
 * Convert a DataValue back into plain data. Integers within the safe
 * range come back as numbers unless `options.integersAsBigInt` is set.
 */
export function toPlain(value: DataValue, options: PlainOptions = {}): unknown {
  switch (value.kind) {
    case 'scalar':
      return plainScalar(value.value, options);
    case 'sequence':
      return value.items.map((item) => toPlain(item, options));
    case 'mapping':
      // fromEntries defines own properties, so a "__proto__" key stays data.
      return Object.fromEntries([...value.entries].map(([key, entry]) => [key, toPlain(entry, options)]));
  }
}

/**
 * Convert one parsed data document into a source's data.
 * An empty document (null or undefined) is empty data; anything other
 * than a mapping at the top level is rejected.
 */
export function sourceDataFromPlain(raw: unknown, path = '$', options: PlainOptions = {}): Result<SourceData> {
  if (raw === null || raw === undefined) {
    return { ok: true, value: new Map() };
  }
  const converted = fromPlain(raw, path, options);
  if (!converted.ok) return converted;
  if (converted.value.kind !== 'mapping') {
    return {
      ok: false,
      error: invalidValue(path, `expected a mapping of keys to values, got ${describeValue(converted.value)}`),
    };
  }
  return { ok: true, value: new Map(converted.value.entries) };
}

/** Convert a source's data into a plain object. */
export function sourceDataToPlain(data: SourceData, options: PlainOptions = {}): Record<string, unknown> {
  return Object.fromEntries([...data].map(([key, value]) => [key, toPlain(value, options)]));
}

// ---------------------------------------------------------------------------
// Equality & description
// ---------------------------------------------------------------------------

/**
 * Structural equality. Sequences compare element-wise in order;
 * mappings compare by key set and per-key value, ignoring key order.
 */
export function valueEquals(a: DataValue, b: DataValue): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'scalar':
      return b.kind === 'scalar' && Object.is(a.value, b.value);
    case 'sequence': {
      if (b.kind !== 'sequence' || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        const left = a.items[i];
        const right = b.items[i];
        if (left === undefined || right === undefined || !valueEquals(left, right)) return false;
      }
      return true;
    }
    case 'mapping': {
      if (b.kind !== 'mapping' || a.entries.size !== b.entries.size) return false;
      for (const [key, left] of a.entries) {
        const right = b.entries.get(key);
        if (right === undefined || !valueEquals(left, right)) return false;
      }
      return true;
    }
  }
}

/** True when `items` holds an element structurally equal to `candidate`. */
export function includesValue(items: readonly DataValue[], candidate: DataValue): boolean {
  return items.some((item) => valueEquals(item, candidate));
}

function describeScalar(value: ScalarPrimitive): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `string ${JSON.stringify(value)}`;
  if (typeof value === 'bigint') return `integer ${String(value)}`;
  return `${typeof value} ${String(value)}`;
}

/** Short description of a value's shape, used in error messages. */
export function describeValue(value: DataValue): string {
  switch (value.kind) {
    case 'scalar':
      return describeScalar(value.value);
    case 'sequence':
      return `sequence of ${String(value.items.length)} item${value.items.length === 1 ? '' : 's'}`;
    case 'mapping':
      return `mapping with keys [${[...value.entries.keys()].join(', ')}]`;
  }
}
