// ── Core: types ──────────────────────────────────────────────────────
export type {
  TypeLeaf,
  Column,
  ColumnMeta,
  NodeKind,
  HierarchyNode,
  FieldRole,
  FieldVisibility,
  FieldSpec,
  TimeBucketKind,
  TimeBucketGroup,
  View,
  JoinSpec,
  Diagnostic,
  TimeframeOverrides,
  NamingOptions,
} from './core/types.js';

// ── Core: errors ─────────────────────────────────────────────────────
export {
  LookformError,
  NameCollisionError,
  HierarchyConsistencyError,
  ConfigError,
} from './core/errors.js';
export type { LookformErrorCode } from './core/errors.js';

// ── Core: type descriptors ───────────────────────────────────────────
export {
  parseTypeDescriptor,
  formatTypeLeaf,
  innerTypesOf,
  normalizeType,
  baseTypeOf,
  isArrayType,
  STRUCT_MARKER,
  REPEATED_STRUCT_MARKER,
  DOUBLE_ARRAY_MARKER,
} from './core/type-descriptor.js';

// ── Core: columns & hierarchy ────────────────────────────────────────
export { createColumn, withColumn, ColumnSet } from './core/columns.js';
export type { ColumnInput } from './core/columns.js';
export {
  buildHierarchy,
  classifyColumn,
  walkHierarchy,
  findHierarchyNodes,
  getHierarchyNode,
  columnsUnder,
  parentPathOf,
  lastSegmentOf,
  pathDepth,
} from './core/hierarchy.js';

// ── Core: naming ─────────────────────────────────────────────────────
export {
  canonicalize,
  resolveCollision,
  stripTimeMarker,
  timeGroupNameOf,
  relativeSegments,
  fieldNameOf,
  viewNameFor,
  titleCase,
  CONFLICT_SUFFIX,
  PATH_SEPARATOR,
} from './core/naming.js';

// ── Core: time buckets ───────────────────────────────────────────────
export {
  DATE_TIMEFRAMES,
  TIME_TIMEFRAMES,
  KNOWN_TIMEFRAMES,
  timeBucketKindOf,
  resolveTimeframes,
  isoFieldNames,
  generatedNamesFor,
  unknownTimeframes,
} from './core/timeframes.js';

// ── Core: config ─────────────────────────────────────────────────────
export { defineConfig, resolveNamingOptions } from './core/config.js';
export type { LookformConfig, LogLevel } from './core/config.js';

// ── Compiler ─────────────────────────────────────────────────────────
export { decompose, resolveBucketCollisions } from './compiler/view-decomposer.js';
export type { DecomposeOptions, Decomposition } from './compiler/view-decomposer.js';
export { buildJoinChain } from './compiler/join-chain.js';
export { compileDocument } from './compiler/document-compiler.js';
export type { CompileOptions, DocumentResult } from './compiler/document-compiler.js';
