// This module parses and formats forecast timestamps and infers the sampling cadence of a series.

export const DAY_MS = 24 * 60 * 60 * 1000;

// Bounds of the YYYY-MM-DDTHH:MM:SS output format.
export const MIN_TIMESTAMP_MS = Date.parse('0000-01-01T00:00:00Z');
export const MAX_TIMESTAMP_MS = Date.parse('9999-12-31T23:59:59.999Z');

const ISO_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

// This helper converts one timezone designator into an offset in milliseconds east of UTC, or null when out of range.
function parseOffsetMs(designator: string | undefined): number | null {
  if (!designator || designator === 'Z') {
    return 0;
  }

  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return sign * (hours * 60 + minutes) * 60 * 1000;
}

export function isFormattableTimestamp(epochMs: number): boolean {
  return Number.isFinite(epochMs) && epochMs >= MIN_TIMESTAMP_MS && epochMs <= MAX_TIMESTAMP_MS;
}

// This function parses an ISO-8601 date or date-time into epoch milliseconds; naive values are read as UTC.
export function parseIsoTimestamp(value: string): number | null {
  const match = ISO_TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, offsetText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? '0');
  const minute = Number(minuteText ?? '0');
  const second = Number(secondText ?? '0');
  const millisecond = fractionText ? Math.round(Number(`0.${fractionText}`) * 1000) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const epochMs = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  const check = new Date(epochMs);
  // Date.UTC silently rolls over invalid calendar days (2021-02-30) and maps years below 100 to 19xx.
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }

  const offsetMs = parseOffsetMs(offsetText);
  if (offsetMs === null) {
    return null;
  }

  const utcMs = epochMs - offsetMs;
  return isFormattableTimestamp(utcMs) ? utcMs : null;
}

// Formats as YYYY-MM-DDTHH:MM:SS in UTC.
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19);
}

// This function returns the most frequent gap between consecutive ascending timestamps, preferring the smallest on ties.
export function inferCadenceMs(sortedTimestamps: number[]): number {
  const counts = new Map<number, number>();
  for (let index = 1; index < sortedTimestamps.length; index += 1) {
    const gap = sortedTimestamps[index] - sortedTimestamps[index - 1];
    if (gap > 0) {
      counts.set(gap, (counts.get(gap) ?? 0) + 1);
    }
  }

  let cadence = DAY_MS;
  let bestCount = 0;
  for (const [gap, count] of counts) {
    if (count > bestCount || (count === bestCount && gap < cadence)) {
      cadence = gap;
      bestCount = count;
    }
  }

  return cadence;
}
