// This test suite verifies tool registry lookup, argument decoding and validation before the forecaster runs.

import pino from 'pino';
import { describe, expect, it } from 'vitest';
import type { Forecaster } from '../src/forecast/adapter.js';
import { ToolRegistry, createToolRegistry, executeTool, type ToolRuntimeContext } from '../src/mcp/tools.js';
import type { ForecastInput } from '../src/types/domain.js';

// This helper builds a runtime context around a recording forecaster.
function makeContext(calls: ForecastInput[] = []): ToolRuntimeContext {
  const forecaster: Forecaster = {
    forecast: async (input) => {
      calls.push(input);
      return {
        meta: { periods: input.periods, n_history: input.ds.length, start: '2021-01-01T00:00:00', end: '2021-01-02T00:00:00' },
        forecast: []
      };
    }
  };

  return {
    forecaster,
    forecastTimeoutMs: 1_000,
    logger: pino({ enabled: false })
  };
}

describe('tool registry', () => {
  it('lists one frozen descriptor per tool', () => {
    const registry = createToolRegistry();
    const tools = registry.list();

    expect(tools.map((tool) => tool.name)).toEqual(['forecast_time_series']);
    expect(Object.isFrozen(tools[0])).toBe(true);
    expect(registry.get('forecast_time_series')?.descriptor.name).toBe('forecast_time_series');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('returns a fresh list snapshot on every call', () => {
    const registry = createToolRegistry();
    const first = registry.list();
    first.pop();

    expect(registry.list()).toHaveLength(1);
  });

  it('refuses descriptors without a handler', () => {
    expect(
      () =>
        new ToolRegistry(
          [{ name: 'orphan', description: 'no handler', inputSchema: {}, annotations: { read_only: true } }],
          new Map()
        )
    ).toThrowError('No handler registered for tool: orphan');
  });
});

describe('executeTool', () => {
  const registry = createToolRegistry();

  it('rejects a non-string tool name', async () => {
    await expect(executeTool(42, {}, registry, makeContext())).resolves.toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Invalid tool call: params.name must be a string.' }]
    });
  });

  it('rejects arguments that are neither objects nor JSON object strings', async () => {
    for (const raw of [[1, 2], '[1, 2]', 7, 'not json']) {
      await expect(executeTool('forecast_time_series', raw, registry, makeContext())).resolves.toEqual({
        isError: true,
        content: [{ type: 'text', text: 'Invalid arguments: expected object or JSON string.' }]
      });
    }
  });

  it('validates missing arguments against the schema', async () => {
    await expect(executeTool('forecast_time_series', undefined, registry, makeContext())).resolves.toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Invalid arguments: ds: Required; y: Required' }]
    });
  });

  it('rejects non-integer periods and unknown keys', async () => {
    const calls: ForecastInput[] = [];
    const result = await executeTool(
      'forecast_time_series',
      { ds: ['2021-01-01', '2021-01-02'], y: [1, 2], periods: 1.5, f: 3 },
      registry,
      makeContext(calls)
    );

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toContain('periods: Expected integer, received float');
    expect(result.content[0].text).toContain("Unrecognized key(s) in object: 'f'");
    expect(calls).toHaveLength(0);
  });

  it('applies the default horizon before calling the forecaster', async () => {
    const calls: ForecastInput[] = [];
    const result = await executeTool(
      'forecast_time_series',
      { ds: ['2021-01-01', '2021-01-02'], y: [1, 2] },
      registry,
      makeContext(calls)
    );

    expect(result.isError).toBeUndefined();
    expect(calls).toEqual([{ ds: ['2021-01-01', '2021-01-02'], y: [1, 2], periods: 10 }]);
    expect(JSON.parse(result.content[0].text)).toMatchObject({ meta: { periods: 10, n_history: 2 } });
  });
});
