import type { Column } from '../core/types.js';
import { createColumn, type ColumnInput } from '../core/columns.js';

// ── columns() test helper ────────────────────────────────────────────

export type ColumnShorthand = string | Omit<ColumnInput, 'path'>;

/**
 * Build columns from a `{ path: type }` map. A value may also be a partial
 * ColumnInput for primary keys, descriptions or meta overrides.
 *
 * @example
 * columns({ id: { declaredType: 'INT64', isPrimaryKey: true }, 'items': 'ARRAY<STRUCT<code STRING>>' })
 */
export function columns(shape: Readonly<Record<string, ColumnShorthand>>): Column[] {
  return Object.entries(shape).map(([path, value]) =>
    typeof value === 'string'
      ? createColumn({ path, declaredType: value })
      : createColumn({ ...value, path }),
  );
}
