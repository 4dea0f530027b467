// This test suite verifies the forecast tool contract and the JSON schema advertised for it.

import { describe, expect, it } from 'vitest';
import { buildToolList, forecastTimeSeriesSchema, formatValidationIssues } from '../src/mcp/tool-schemas.js';

describe('forecast tool schema', () => {
  it('defaults periods to 10', () => {
    expect(forecastTimeSeriesSchema.parse({ ds: ['2021-01-01'], y: [1] })).toEqual({
      ds: ['2021-01-01'],
      y: [1],
      periods: 10
    });
  });

  it('rejects empty and misaligned series', () => {
    const empty = forecastTimeSeriesSchema.safeParse({ ds: [], y: [] });
    expect(empty.success).toBe(false);

    const misaligned = forecastTimeSeriesSchema.safeParse({ ds: ['2021-01-01', '2021-01-02'], y: [1] });
    expect(misaligned.success).toBe(false);
    if (!misaligned.success) {
      expect(formatValidationIssues(misaligned.error)).toBe('y: Expected 2 values aligned with ds, received 1.');
    }
  });

  it('rejects non-positive horizons', () => {
    expect(forecastTimeSeriesSchema.safeParse({ ds: ['2021-01-01'], y: [1], periods: 0 }).success).toBe(false);
    expect(forecastTimeSeriesSchema.safeParse({ ds: ['2021-01-01'], y: [1], periods: -3 }).success).toBe(false);
  });

  it('advertises an inline JSON schema without $schema or $ref', () => {
    const [tool] = buildToolList();

    expect(tool.name).toBe('forecast_time_series');
    expect(tool.inputSchema).not.toHaveProperty('$schema');
    expect(tool.inputSchema).not.toHaveProperty('$ref');
    expect(tool.inputSchema).toMatchObject({
      type: 'object',
      properties: {
        ds: { type: 'array', items: { type: 'string' }, description: 'List of dates in ISO format (e.g., YYYY-MM-DD).' },
        y: { type: 'array', items: { type: 'number' }, description: 'List of numeric values aligned with ds.' },
        periods: { type: 'integer', default: 10, description: 'Number of future periods to forecast.' }
      },
      required: ['ds', 'y'],
      additionalProperties: false
    });
  });
});
