/**
 * tierdata
 *
 * Resolve desired end-state changes across a hierarchy of sources whose
 * data is inherited from their ancestors, keeping each source's own data
 * free of values it already inherits.
 *
 * @packageDocumentation
 */

// Types
export type {
  ScalarPrimitive,
  ScalarValue,
  SequenceValue,
  MappingValue,
  DataValue,
  ValueKind,
  SourceId,
  SourceData,
  DataSnapshot,
  HierarchyNode,
  Hierarchy,
  Change,
  ResolveRequest,
  Result,
} from './types.js';

// Errors
export type { TierdataError, TierdataErrorCode } from './errors.js';
export {
  targetNotFound,
  notMergeable,
  malformedChange,
  invalidHierarchy,
  invalidValue,
  invalidInput,
  ioError,
  formatError,
} from './errors.js';

// Values
export {
  scalar,
  sequence,
  mapping,
  copyValue,
  fromPlain,
  toPlain,
  sourceDataFromPlain,
  sourceDataToPlain,
  valueEquals,
  describeValue,
} from './values/value.js';
export type { PlainOptions } from './values/value.js';

// Hierarchy
export { createHierarchy, node } from './hierarchy/hierarchy.js';
export { parseHierarchy } from './hierarchy/hierarchy-parser.js';

// Changes
export { createChange, changeFromRecord, changeToRecord, changesEqual } from './changes/change.js';

// Merge & lookup
export { mergeValues, unmergeValues } from './merge/merger.js';
export type { DataLookup } from './lookup/data-lookup.js';
export { createDataLookup } from './lookup/data-lookup.js';

// Resolution
export { resolve, generateSources, resolveSource } from './resolver/resolver.js';

// I/O
export { parseChanges } from './io/changes-loader.js';
export { readDocuments, parseYamlDocuments } from './io/documents.js';
export type { LoadedDocuments } from './io/documents.js';
export { readDataSnapshot, writeDataSnapshot } from './io/data-store.js';

// Config
export type { Inputs, RunInputs } from './config/inputs.js';
export {
  fallingBackTo,
  overriddenWith,
  parseMergeKeys,
  inputsFromArgs,
  inputsFromConfigFile,
  loadInputs,
} from './config/inputs.js';

// Logging
export type { Logger, LogLevel, LogEntry } from './logging/logger.js';
export { ConsoleLogger } from './logging/logger.js';

// CLI
export { runCli } from './cli/cli.js';
