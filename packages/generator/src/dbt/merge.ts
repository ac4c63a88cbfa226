import {
  ColumnSet,
  baseTypeOf,
  createColumn,
  parseTypeDescriptor,
  withColumn,
  type ColumnMeta,
} from '@lookform/core';
import type { CatalogColumn, CatalogNode, ManifestColumn, ManifestNode } from './schemas.js';

// ── Types ───────────────────────────────────────────────────────────

export interface MergedColumns {
  readonly columns: ColumnSet;
  /** Paths added from catalog type descriptors rather than declared columns. */
  readonly repaired: readonly string[];
}

const COMPOSITE_BASE_TYPES: ReadonlySet<string> = new Set(['ARRAY', 'STRUCT']);

// ── Manifest columns ────────────────────────────────────────────────

function metaOf(column: ManifestColumn): ColumnMeta {
  const looker = column.meta?.looker;
  if (!looker) return {};
  return {
    label: looker.label,
    groupLabel: looker.group_label,
    hidden: looker.hidden,
    valueFormatName: looker.value_format_name,
  };
}

function primaryKeysOf(node: ManifestNode): Set<string> {
  const keys = new Set<string>();
  for (const constraint of node.constraints ?? []) {
    if (constraint.type !== 'primary_key') continue;
    for (const name of constraint.columns ?? []) keys.add(name.toLowerCase());
  }
  for (const column of Object.values(node.columns)) {
    const declared =
      column.meta?.looker?.primary_key === true ||
      (column.constraints ?? []).some((c) => c.type === 'primary_key');
    if (declared) keys.add(column.name.toLowerCase());
  }
  return keys;
}

// ── buildColumnSet ──────────────────────────────────────────────────

/**
 * Merge a model's declared columns with its catalog entry.
 *
 * Declared columns come first with their metadata; the catalog then supplies
 * the materialized type and source casing. Columns known only to the catalog
 * are added, and catalog-only ARRAY/STRUCT columns are expanded from their
 * type descriptor for any nested path not already present.
 */
export function buildColumnSet(node: ManifestNode, catalogNode?: CatalogNode): MergedColumns {
  const primaryKeys = primaryKeysOf(node);
  let columns = ColumnSet.empty();

  for (const column of Object.values(node.columns)) {
    columns = columns.with(
      createColumn({
        path: column.name,
        declaredType: column.data_type,
        isPrimaryKey: primaryKeys.has(column.name.toLowerCase()),
        description: column.description,
        meta: metaOf(column),
      }),
    );
  }

  const catalogColumns: CatalogColumn[] = Object.values(catalogNode?.columns ?? {});
  const catalogOnly: CatalogColumn[] = [];

  for (const entry of catalogColumns) {
    const declared = columns.get(entry.name);
    if (!declared) {
      catalogOnly.push(entry);
      continue;
    }
    columns = columns.with(
      withColumn(declared, {
        originalPath: entry.name,
        declaredType: entry.type ?? undefined,
        description: declared.description ?? entry.comment ?? undefined,
      }),
    );
  }

  const repaired: string[] = [];

  for (const entry of catalogOnly) {
    columns = columns.with(
      createColumn({
        path: entry.name,
        declaredType: entry.type,
        isPrimaryKey: primaryKeys.has(entry.name.toLowerCase()),
        description: entry.comment,
      }),
    );
  }

  for (const entry of catalogOnly) {
    const type = entry.type ?? '';
    if (!COMPOSITE_BASE_TYPES.has(baseTypeOf(type))) continue;

    for (const leaf of parseTypeDescriptor(type)) {
      const path = `${entry.name}.${leaf.path}`;
      if (columns.has(path)) continue;
      columns = columns.with(createColumn({ path, declaredType: leaf.type }));
      repaired.push(path.toLowerCase());
    }
  }

  return { columns, repaired };
}
