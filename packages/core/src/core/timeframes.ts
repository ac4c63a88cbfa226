import type { TimeBucketKind, TimeframeOverrides } from './types.js';
import { baseTypeOf } from './type-descriptor.js';

// ── Bucket catalogues ───────────────────────────────────────────────

export const DATE_TIMEFRAMES: readonly string[] = Object.freeze([
  'raw',
  'date',
  'day_of_month',
  'day_of_week',
  'day_of_week_index',
  'week',
  'week_of_year',
  'month',
  'month_num',
  'month_name',
  'quarter',
  'quarter_of_year',
  'year',
]);

export const TIME_TIMEFRAMES: readonly string[] = Object.freeze([
  'raw',
  'time',
  'time_of_day',
  'date',
  'week',
  'month',
  'quarter',
  'year',
]);

/** Step sizes Looker accepts for `hourN`, `minuteN` and `millisecondN` timeframes. */
const STEPPED_TIMEFRAMES: Readonly<Record<string, readonly number[]>> = {
  hour: [2, 3, 4, 6, 8, 12],
  minute: [2, 3, 4, 5, 6, 10, 12, 15, 20, 30],
  millisecond: [2, 4, 5, 8, 10, 20, 25, 40, 50, 100, 125, 200, 250, 500],
};

/** Every timeframe a dimension group accepts. */
export const KNOWN_TIMEFRAMES: ReadonlySet<string> = new Set([
  ...DATE_TIMEFRAMES,
  ...TIME_TIMEFRAMES,
  'hour',
  'hour_of_day',
  'minute',
  'second',
  'millisecond',
  'microsecond',
  'day_of_year',
  'fiscal_month_num',
  'fiscal_quarter',
  'fiscal_quarter_of_year',
  'fiscal_year',
  'yesno',
  ...Object.entries(STEPPED_TIMEFRAMES).flatMap(([unit, steps]) =>
    steps.map((step) => `${unit}${step}`),
  ),
]);

const TIME_KIND_BY_BASE_TYPE: Readonly<Record<string, TimeBucketKind>> = {
  DATE: 'date',
  DATETIME: 'time',
  TIMESTAMP: 'time',
};

// ── Lookups ─────────────────────────────────────────────────────────

/** `'date'` for DATE columns, `'time'` for TIMESTAMP/DATETIME, else undefined. */
export function timeBucketKindOf(declaredType: string): TimeBucketKind | undefined {
  return TIME_KIND_BY_BASE_TYPE[baseTypeOf(declaredType)];
}

export function resolveTimeframes(
  kind: TimeBucketKind,
  overrides?: TimeframeOverrides,
): readonly string[] {
  const override = overrides?.[kind];
  if (override && override.length > 0) return override;
  return kind === 'date' ? DATE_TIMEFRAMES : TIME_TIMEFRAMES;
}

/** ISO calendar supplements, named after the source field rather than the group. */
export function isoFieldNames(fieldName: string): string[] {
  return [`${fieldName}_iso_year`, `${fieldName}_iso_week_of_year`];
}

/**
 * Field names a time-bucket group occupies: the bare group name, one
 * `<group>_<bucket>` per bucket, then any ISO supplements.
 */
export function generatedNamesFor(
  groupName: string,
  buckets: readonly string[],
  isoFields: readonly string[] = [],
): string[] {
  return [groupName, ...buckets.map((bucket) => `${groupName}_${bucket}`), ...isoFields];
}

/** Timeframe names in `list` that no dimension group accepts. */
export function unknownTimeframes(list: readonly string[]): string[] {
  return list.filter((timeframe) => !KNOWN_TIMEFRAMES.has(timeframe));
}
