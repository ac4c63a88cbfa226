import type { Column, ColumnMeta } from './types.js';
import { innerTypesOf } from './type-descriptor.js';

// ── Column construction ─────────────────────────────────────────────

export interface ColumnInput {
  readonly path: string;
  readonly originalPath?: string;
  readonly declaredType?: string | null;
  readonly innerTypes?: readonly string[];
  readonly isPrimaryKey?: boolean;
  readonly description?: string | null;
  readonly meta?: ColumnMeta;
}

const EMPTY_META: ColumnMeta = Object.freeze({});

/**
 * Build a frozen Column. The path is lower-cased for identity; the given
 * casing is kept as `originalPath` unless one is passed explicitly.
 * Inner types are derived from the declared type when not supplied.
 */
export function createColumn(input: ColumnInput): Column {
  const declaredType = (input.declaredType ?? '').trim();
  const originalPath = input.originalPath ?? input.path;

  if (originalPath.toLowerCase() !== input.path.toLowerCase()) {
    throw new Error(
      `Column original path '${originalPath}' does not match path '${input.path}'`,
    );
  }

  const column: Column = {
    path: input.path.toLowerCase(),
    originalPath,
    declaredType,
    innerTypes: Object.freeze([...(input.innerTypes ?? innerTypesOf(declaredType))]),
    isPrimaryKey: input.isPrimaryKey ?? false,
    description: input.description ?? undefined,
    meta: input.meta ? Object.freeze({ ...input.meta }) : EMPTY_META,
  };
  return Object.freeze(column);
}

/** Copy-on-write update of a column; identity fields keep their invariants. */
export function withColumn(column: Column, changes: Omit<ColumnInput, 'path'>): Column {
  return createColumn({
    path: column.path,
    originalPath: changes.originalPath ?? column.originalPath,
    declaredType: changes.declaredType ?? column.declaredType,
    innerTypes:
      changes.innerTypes ?? (changes.declaredType != null ? undefined : column.innerTypes),
    isPrimaryKey: changes.isPrimaryKey ?? column.isPrimaryKey,
    description: changes.description !== undefined ? changes.description : column.description,
    meta: changes.meta ?? column.meta,
  });
}

// ── ColumnSet ───────────────────────────────────────────────────────

/**
 * Immutable insertion-ordered set of columns keyed by lower-cased path.
 * Adding a column whose path is already present replaces it (last write wins).
 */
export class ColumnSet implements Iterable<Column> {
  private readonly byPath: ReadonlyMap<string, Column>;

  private constructor(byPath: ReadonlyMap<string, Column>) {
    this.byPath = byPath;
  }

  static empty(): ColumnSet {
    return new ColumnSet(new Map());
  }

  static from(columns: Iterable<Column>): ColumnSet {
    const byPath = new Map<string, Column>();
    for (const column of columns) {
      byPath.set(column.path.toLowerCase(), column);
    }
    return new ColumnSet(byPath);
  }

  with(column: Column): ColumnSet {
    const byPath = new Map(this.byPath);
    byPath.set(column.path.toLowerCase(), column);
    return new ColumnSet(byPath);
  }

  get(path: string): Column | undefined {
    return this.byPath.get(path.toLowerCase());
  }

  has(path: string): boolean {
    return this.byPath.has(path.toLowerCase());
  }

  get size(): number {
    return this.byPath.size;
  }

  paths(): string[] {
    return [...this.byPath.keys()];
  }

  values(): Column[] {
    return [...this.byPath.values()];
  }

  [Symbol.iterator](): Iterator<Column> {
    return this.byPath.values();
  }
}
