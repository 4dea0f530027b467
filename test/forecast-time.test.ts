// This test suite verifies timestamp parsing, formatting and cadence inference for forecast inputs.

import { describe, expect, it } from 'vitest';
import {
  DAY_MS,
  MAX_TIMESTAMP_MS,
  MIN_TIMESTAMP_MS,
  formatTimestamp,
  inferCadenceMs,
  isFormattableTimestamp,
  parseIsoTimestamp
} from '../src/forecast/time.js';

const HOUR_MS = 60 * 60 * 1000;

describe('forecast timestamps', () => {
  it('parses dates and naive date-times as UTC', () => {
    expect(parseIsoTimestamp('2021-01-01')).toBe(Date.UTC(2021, 0, 1));
    expect(parseIsoTimestamp('2021-01-01T12:30:00')).toBe(Date.UTC(2021, 0, 1, 12, 30));
    expect(parseIsoTimestamp('2021-01-01 12:30')).toBe(Date.UTC(2021, 0, 1, 12, 30));
    expect(parseIsoTimestamp(' 2021-01-01 ')).toBe(Date.UTC(2021, 0, 1));
  });

  it('applies explicit offsets', () => {
    expect(parseIsoTimestamp('2021-01-01T12:30:00Z')).toBe(Date.UTC(2021, 0, 1, 12, 30));
    expect(parseIsoTimestamp('2021-01-01T12:30:00+02:00')).toBe(Date.UTC(2021, 0, 1, 10, 30));
    expect(parseIsoTimestamp('2021-01-01T12:30:00-0130')).toBe(Date.UTC(2021, 0, 1, 14, 0));
  });

  it('rejects malformed or impossible calendar values', () => {
    expect(parseIsoTimestamp('not-a-date')).toBeNull();
    expect(parseIsoTimestamp('2021-02-30')).toBeNull();
    expect(parseIsoTimestamp('2021-13-01')).toBeNull();
    expect(parseIsoTimestamp('2021-01-01T24:00:00')).toBeNull();
    expect(parseIsoTimestamp('01/02/2021')).toBeNull();
  });

  it('rejects offsets outside the clock range', () => {
    expect(parseIsoTimestamp('2021-01-01T12:30:00+24:00')).toBeNull();
    expect(parseIsoTimestamp('2021-01-01T12:30:00+05:60')).toBeNull();
    expect(parseIsoTimestamp('2021-01-01T12:30:00+99:99')).toBeNull();
    expect(parseIsoTimestamp('2021-01-01T12:30:00-23:59')).toBe(Date.UTC(2021, 0, 2, 12, 29));
  });

  it('rejects instants that fall past year 9999 once converted to UTC', () => {
    expect(parseIsoTimestamp('9999-12-31T23:59:59')).toBe(Date.UTC(9999, 11, 31, 23, 59, 59));
    expect(parseIsoTimestamp('9999-12-31T23:00:00-05:00')).toBeNull();
  });

  it('bounds formattable instants to four-digit years', () => {
    expect(isFormattableTimestamp(MAX_TIMESTAMP_MS)).toBe(true);
    expect(isFormattableTimestamp(MAX_TIMESTAMP_MS + 1)).toBe(false);
    expect(isFormattableTimestamp(MIN_TIMESTAMP_MS - 1)).toBe(false);
    expect(isFormattableTimestamp(Number.NaN)).toBe(false);
    expect(formatTimestamp(MAX_TIMESTAMP_MS)).toBe('9999-12-31T23:59:59');
  });

  it('formats timestamps without zone or milliseconds', () => {
    expect(formatTimestamp(Date.UTC(2021, 0, 3))).toBe('2021-01-03T00:00:00');
    expect(formatTimestamp(Date.UTC(2021, 5, 15, 8, 5, 9, 250))).toBe('2021-06-15T08:05:09');
  });

  it('infers the most frequent gap as cadence', () => {
    expect(inferCadenceMs([0, DAY_MS, 2 * DAY_MS, 9 * DAY_MS])).toBe(DAY_MS);
    expect(inferCadenceMs([0, 7 * DAY_MS, 14 * DAY_MS, 15 * DAY_MS])).toBe(7 * DAY_MS);
  });

  it('prefers the smallest gap on ties', () => {
    expect(inferCadenceMs([0, HOUR_MS, 3 * HOUR_MS])).toBe(HOUR_MS);
  });
});
