/**
 * tierdata — Core type definitions
 *
 * Public types for resolving end-state changes across a hierarchy of
 * sources whose data is inherited from their ancestors.
 */

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/**
 * Primitive leaf of a data document. Integers are `bigint`; a `number`
 * is a float.
 */
export type ScalarPrimitive = string | number | bigint | boolean | null;

/** A single scalar. */
export interface ScalarValue {
  readonly kind: 'scalar';
  readonly value: ScalarPrimitive;
}

/** An ordered list of values. */
export interface SequenceValue {
  readonly kind: 'sequence';
  readonly items: readonly DataValue[];
}

/** A string-keyed map of values, in insertion order. */
export interface MappingValue {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, DataValue>;
}

/** Discriminated union of every value a source may hold under a key. */
export type DataValue = ScalarValue | SequenceValue | MappingValue;

/** Tag of a DataValue variant. */
export type ValueKind = DataValue['kind'];

// ---------------------------------------------------------------------------
// Sources & Snapshots
// ---------------------------------------------------------------------------

/** Opaque identifier of one data source (e.g. a relative file path). */
export type SourceId = string;

/** One source's own stored key/value data, not flattened with its ancestors. */
export type SourceData = ReadonlyMap<string, DataValue>;

/** Every source's own stored data. */
export type DataSnapshot = ReadonlyMap<SourceId, SourceData>;

// ---------------------------------------------------------------------------
// Hierarchy
// ---------------------------------------------------------------------------

/** A node of the source tree as declared by the caller. */
export interface HierarchyNode {
  readonly source: SourceId;
  readonly children: readonly HierarchyNode[];
}

/** An ordered forest of sources answering ancestry queries. */
export interface Hierarchy {
  /** Sources from the root down to and including `source`; undefined when unknown. */
  ancestorsOf(source: SourceId): readonly SourceId[] | undefined;
  /** `source` followed by its whole subtree in pre-order; undefined when unknown. */
  descendantsOf(source: SourceId): readonly SourceId[] | undefined;
  /** Every source of the forest in pre-order. */
  sources(): readonly SourceId[];
  /** Indented rendering of the whole forest. */
  render(): string;
}

// ---------------------------------------------------------------------------
// Changes
// ---------------------------------------------------------------------------

/** A desired end-state change declared at one source. */
export interface Change {
  readonly source: SourceId;
  readonly set: ReadonlyMap<string, DataValue>;
  /** Top-level keys to remove. */
  readonly remove: readonly string[];
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Arguments of a single resolution call. */
export interface ResolveRequest {
  readonly hierarchy: Hierarchy;
  readonly changes: Iterable<Change>;
  /** Source at and below which data is rewritten. */
  readonly target: SourceId;
  readonly data: DataSnapshot;
  /** Keys inherited by union across ancestors instead of nearest-wins. */
  readonly mergeKeys: ReadonlySet<string>;
}

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** A discriminated union for fallible operations. */
export type Result<T, E = import('./errors.js').TierdataError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ---------------------------------------------------------------------------
// Error Types (re-exported from errors.ts for convenience)
// ---------------------------------------------------------------------------

export type { TierdataError, TierdataErrorCode } from './errors.js';
