import { baseTypeOf } from '@lookform/core';

// ── Warehouse → LookML types ────────────────────────────────────────

export type LookmlType = 'number' | 'string' | 'yesno' | 'date' | 'timestamp' | 'datetime';

const LOOKML_TYPE_BY_BASE_TYPE: Readonly<Record<string, LookmlType>> = {
  INT64: 'number',
  INTEGER: 'number',
  FLOAT: 'number',
  FLOAT64: 'number',
  NUMERIC: 'number',
  BIGNUMERIC: 'number',
  BOOL: 'yesno',
  BOOLEAN: 'yesno',
  STRING: 'string',
  TIME: 'string',
  GEOGRAPHY: 'string',
  BYTES: 'string',
  ARRAY: 'string',
  STRUCT: 'string',
  TIMESTAMP: 'timestamp',
  DATETIME: 'datetime',
  DATE: 'date',
};

/** LookML type for a BigQuery column type, or undefined when unmapped. */
export function lookmlTypeOf(declaredType: string): LookmlType | undefined {
  return LOOKML_TYPE_BY_BASE_TYPE[baseTypeOf(declaredType)];
}

export type TimeDatatype = 'date' | 'timestamp' | 'datetime';

export interface DimensionType {
  readonly type: 'number' | 'string' | 'yesno' | 'date' | 'date_time';
  /** Set for date and time columns. */
  readonly datatype?: TimeDatatype;
}

/** `type:` (and `datatype:`) of a plain dimension, or undefined when unmapped. */
export function dimensionTypeOf(declaredType: string): DimensionType | undefined {
  const type = lookmlTypeOf(declaredType);
  switch (type) {
    case undefined:
      return undefined;
    case 'date':
      return { type: 'date', datatype: 'date' };
    case 'timestamp':
    case 'datetime':
      return { type: 'date_time', datatype: type };
    default:
      return { type };
  }
}
