// ── Type descriptors ─────────────────────────────────────────────────

/** One flattened `(path, type)` pair produced from a composite type string. */
export interface TypeLeaf {
  readonly path: string;
  readonly type: string;
}

// ── Columns ──────────────────────────────────────────────────────────

/** Per-column presentation overrides carried through from model metadata. */
export interface ColumnMeta {
  readonly label?: string;
  readonly groupLabel?: string;
  readonly hidden?: boolean;
  readonly valueFormatName?: string;
}

export interface Column {
  /** Lower-cased dotted path; the column's identity within a ColumnSet. */
  readonly path: string;
  /** Dotted path in source casing. */
  readonly originalPath: string;
  readonly declaredType: string;
  /** Raw nested-type fragments, e.g. `['STRING']` or `['a INT64', 'b STRING']`. */
  readonly innerTypes: readonly string[];
  readonly isPrimaryKey: boolean;
  readonly description?: string;
  readonly meta: ColumnMeta;
}

// ── Hierarchy ────────────────────────────────────────────────────────

export type NodeKind = 'Scalar' | 'Struct' | 'ArrayOfScalar' | 'ArrayOfStruct';

export interface HierarchyNode {
  /** Lower-cased dotted path, `''` for the virtual super-root. */
  readonly path: string;
  /** Last path segment in source casing. */
  readonly segment: string;
  readonly column: Column;
  readonly kind: NodeKind;
  /** True when no column was registered for this path and one was inferred. */
  readonly synthesized: boolean;
  readonly children: ReadonlyMap<string, HierarchyNode>;
}

// ── Views ────────────────────────────────────────────────────────────

export type FieldRole = 'dimension' | 'repeated-group' | 'simple-repeated' | 'identity';

export type FieldVisibility = 'visible' | 'hidden';

export interface FieldSpec {
  readonly name: string;
  readonly column: Column;
  readonly role: FieldRole;
  readonly visibility: FieldVisibility;
  readonly groupLabel?: string;
  readonly itemLabel: string;
  /** Source-cased path relative to the owning view, `''` for the view itself. */
  readonly sqlPath: string;
  readonly renamedFrom?: string;
  readonly note?: string;
}

export type TimeBucketKind = 'date' | 'time';

export interface TimeBucketGroup {
  readonly name: string;
  readonly kind: TimeBucketKind;
  readonly column: Column;
  /** Name the column would have had as a plain field. */
  readonly fieldName: string;
  readonly buckets: readonly string[];
  readonly isoFields: readonly string[];
  /** Every field name the group occupies: its own name, each bucket and ISO field. */
  readonly generatedNames: readonly string[];
  readonly groupLabel?: string;
  readonly sqlPath: string;
  /** Set when another group in the same view already held the derived name. */
  readonly renamedFrom?: string;
}

export interface View {
  readonly name: string;
  /** Path of the repeated group the view is scoped to, `''` for the root view. */
  readonly path: string;
  readonly isRoot: boolean;
  readonly fields: readonly FieldSpec[];
  readonly timeBuckets: readonly TimeBucketGroup[];
}

// ── Joins ────────────────────────────────────────────────────────────

export interface JoinSpec {
  readonly childView: string;
  readonly parentView: string;
  /** Field of the parent view holding the array, canonical segments joined by `__`. */
  readonly unnestPath: string;
  /** Dot count of the repeated group's path. Informational only. */
  readonly depth: number;
}

// ── Diagnostics ──────────────────────────────────────────────────────

export interface Diagnostic {
  readonly severity: 'warning' | 'info';
  readonly message: string;
  readonly path?: string;
  readonly view?: string;
}

// ── Naming options ───────────────────────────────────────────────────

export interface TimeframeOverrides {
  readonly date?: readonly string[];
  readonly time?: readonly string[];
}

export interface NamingOptions {
  /** Derive the base view name from the materialized table instead of the model. */
  readonly useTableName: boolean;
  /** Add ISO year and ISO week-of-year fields to date buckets. */
  readonly includeIsoFields: boolean;
  readonly timeframes?: TimeframeOverrides;
}
