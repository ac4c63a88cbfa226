import { describe, it, expect } from 'vitest';
import {
  DATE_TIMEFRAMES,
  TIME_TIMEFRAMES,
  timeBucketKindOf,
  resolveTimeframes,
  isoFieldNames,
  generatedNamesFor,
  unknownTimeframes,
} from '../../src/core/timeframes.js';

describe('timeBucketKindOf', () => {
  it('maps DATE to date buckets and TIMESTAMP/DATETIME to time buckets', () => {
    expect(timeBucketKindOf('DATE')).toBe('date');
    expect(timeBucketKindOf('timestamp')).toBe('time');
    expect(timeBucketKindOf('DATETIME')).toBe('time');
    expect(timeBucketKindOf('TIME')).toBeUndefined();
    expect(timeBucketKindOf('STRING')).toBeUndefined();
  });
});

describe('resolveTimeframes', () => {
  it('uses the default catalogue per kind', () => {
    expect(resolveTimeframes('date')).toBe(DATE_TIMEFRAMES);
    expect(resolveTimeframes('time')).toBe(TIME_TIMEFRAMES);
  });

  it('prefers a non-empty override for the kind', () => {
    const overrides = { date: ['date', 'year'], time: [] };
    expect(resolveTimeframes('date', overrides)).toEqual(['date', 'year']);
    expect(resolveTimeframes('time', overrides)).toBe(TIME_TIMEFRAMES);
  });
});

describe('generated names', () => {
  it('lists the group, each bucket and ISO supplements', () => {
    expect(generatedNamesFor('created', ['date', 'month'], isoFieldNames('created_date'))).toEqual([
      'created',
      'created_date',
      'created_month',
      'created_date_iso_year',
      'created_date_iso_week_of_year',
    ]);
  });

  it('reports timeframes no dimension group accepts', () => {
    expect(unknownTimeframes(['date', 'fortnight', 'hour'])).toEqual(['fortnight']);
  });

  it('accepts stepped hour, minute and millisecond timeframes', () => {
    expect(
      unknownTimeframes(['hour2', 'hour12', 'minute15', 'minute30', 'millisecond500', 'day_of_year']),
    ).toEqual([]);
    expect(unknownTimeframes(['hour5', 'minute7', 'millisecond3'])).toEqual([
      'hour5',
      'minute7',
      'millisecond3',
    ]);
  });
});
