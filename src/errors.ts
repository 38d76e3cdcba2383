/**
 * tierdata — Error types
 *
 * Discriminated union of all error types the library can produce.
 */

/** All possible error codes produced by tierdata. */
export type TierdataErrorCode =
  | 'TARGET_NOT_FOUND'
  | 'NOT_MERGEABLE'
  | 'MALFORMED_CHANGE'
  | 'INVALID_HIERARCHY'
  | 'INVALID_VALUE'
  | 'INVALID_INPUT'
  | 'IO_ERROR';

/** Discriminated union of all tierdata errors. */
export type TierdataError =
  | {
      readonly code: 'TARGET_NOT_FOUND';
      readonly target: string;
      /** Rendering of the whole hierarchy, for diagnosis. */
      readonly hierarchy: string;
    }
  | {
      readonly code: 'NOT_MERGEABLE';
      readonly key: string;
      readonly existing: string;
      readonly incoming: string;
    }
  | {
      readonly code: 'MALFORMED_CHANGE';
      readonly reason: string;
      /** Position of the record in its document, when known. */
      readonly index?: number | undefined;
    }
  | {
      readonly code: 'INVALID_HIERARCHY';
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_VALUE';
      readonly path: string;
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_INPUT';
      readonly field: string;
      readonly reason: string;
    }
  | {
      readonly code: 'IO_ERROR';
      readonly operation: string;
      readonly path: string;
      readonly reason: string;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create a TARGET_NOT_FOUND error. */
export function targetNotFound(target: string, hierarchy: string): TierdataError {
  return { code: 'TARGET_NOT_FOUND', target, hierarchy } as const;
}

/** Create a NOT_MERGEABLE error. */
export function notMergeable(key: string, existing: string, incoming: string): TierdataError {
  return { code: 'NOT_MERGEABLE', key, existing, incoming } as const;
}

/** Create a MALFORMED_CHANGE error. */
export function malformedChange(reason: string, index?: number): TierdataError {
  return { code: 'MALFORMED_CHANGE', reason, index } as const;
}

/** Create an INVALID_HIERARCHY error. */
export function invalidHierarchy(reason: string): TierdataError {
  return { code: 'INVALID_HIERARCHY', reason } as const;
}

/** Create an INVALID_VALUE error. */
export function invalidValue(path: string, reason: string): TierdataError {
  return { code: 'INVALID_VALUE', path, reason } as const;
}

/** Create an INVALID_INPUT error. */
export function invalidInput(field: string, reason: string): TierdataError {
  return { code: 'INVALID_INPUT', field, reason } as const;
}

/** Create an IO_ERROR error. */
export function ioError(operation: string, path: string, reason: string): TierdataError {
  return { code: 'IO_ERROR', operation, path, reason } as const;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Render an error as a human-readable message. */
export function formatError(error: TierdataError): string {
  switch (error.code) {
    case 'TARGET_NOT_FOUND':
      return `Could not find target in hierarchy. Target: ${error.target}. Hierarchy:\n${error.hierarchy}`;
    case 'NOT_MERGEABLE':
      return `Cannot merge values for key "${error.key}": existing value is ${error.existing}, incoming value is ${error.incoming}`;
    case 'MALFORMED_CHANGE':
      return error.index === undefined
        ? `Malformed change: ${error.reason}`
        : `Malformed change at index ${String(error.index)}: ${error.reason}`;
    case 'INVALID_HIERARCHY':
      return `Invalid hierarchy: ${error.reason}`;
    case 'INVALID_VALUE':
      return `Invalid value at ${error.path}: ${error.reason}`;
    case 'INVALID_INPUT':
      return `Invalid input "${error.field}": ${error.reason}`;
    case 'IO_ERROR':
      return `Failed to ${error.operation} ${error.path}: ${error.reason}`;
  }
}
