// This module holds the read-only tool registry and turns tools/call requests into MCP tool results.

import type { FastifyBaseLogger } from 'fastify';
import { isForecastFailure, type Forecaster } from '../forecast/adapter.js';
import type { McpTool, ToolCallResult } from '../types/mcp.js';
import { isJsonObject, tryParseJson } from '../utils/json.js';
import { sanitizeForLog } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import {
  FORECAST_TOOL_NAME,
  buildToolList,
  forecastTimeSeriesSchema,
  formatValidationIssues
} from './tool-schemas.js';

export interface ToolRuntimeContext {
  forecaster: Forecaster;
  forecastTimeoutMs: number;
  logger: FastifyBaseLogger;
}

export type ToolHandler = (args: Record<string, unknown>, context: ToolRuntimeContext) => Promise<ToolCallResult>;

export interface ToolEntry {
  descriptor: McpTool;
  handler: ToolHandler;
}

// This helper wraps one text payload as a successful tool result.
export function toolText(text: string): ToolCallResult {
  return { content: [{ type: 'text', text }] };
}

// This helper wraps one text payload as a failed tool result.
export function toolError(text: string): ToolCallResult {
  return { isError: true, content: [{ type: 'text', text }] };
}

async function handleForecastTimeSeries(
  args: Record<string, unknown>,
  context: ToolRuntimeContext
): Promise<ToolCallResult> {
  const parsed = forecastTimeSeriesSchema.safeParse(args);
  if (!parsed.success) {
    return toolError(`Invalid arguments: ${formatValidationIssues(parsed.error)}`);
  }

  const outcome = await withTimeout(
    (signal) => context.forecaster.forecast(parsed.data, signal),
    context.forecastTimeoutMs,
    'Forecast'
  );

  if (isForecastFailure(outcome)) {
    context.logger.warn(
      {
        event: 'forecast_failed',
        message: outcome.error
      },
      'forecast_failed'
    );
    return toolError(JSON.stringify(outcome));
  }

  return toolText(JSON.stringify(outcome));
}

const toolHandlers = new Map<string, ToolHandler>([[FORECAST_TOOL_NAME, handleForecastTimeSeries]]);

// This class exposes the tool catalog built at startup; it is never mutated afterwards.
export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, ToolEntry>;
  private readonly descriptors: readonly McpTool[];

  public constructor(descriptors: McpTool[], handlers: ReadonlyMap<string, ToolHandler>) {
    const entries = new Map<string, ToolEntry>();

    for (const descriptor of descriptors) {
      const handler = handlers.get(descriptor.name);
      if (!handler) {
        throw new Error(`No handler registered for tool: ${descriptor.name}`);
      }
      if (entries.has(descriptor.name)) {
        throw new Error(`Duplicate tool name: ${descriptor.name}`);
      }
      entries.set(descriptor.name, { descriptor: Object.freeze({ ...descriptor }), handler });
    }

    this.entries = entries;
    this.descriptors = Object.freeze([...entries.values()].map((entry) => entry.descriptor));
  }

  public list(): McpTool[] {
    return [...this.descriptors];
  }

  public get(name: string): ToolEntry | undefined {
    return this.entries.get(name);
  }
}

export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry(buildToolList(), toolHandlers);
}

// This helper decodes tools/call arguments given either as an object or as a JSON string.
function decodeArguments(raw: unknown): Record<string, unknown> | null {
  if (raw === undefined || raw === null) {
    return {};
  }

  if (typeof raw === 'string') {
    const parsed = tryParseJson(raw);
    return parsed.ok && isJsonObject(parsed.value) ? parsed.value : null;
  }

  return isJsonObject(raw) ? raw : null;
}

// This function resolves and runs one tool; tool-specific failures come back as isError results, never as throws.
export async function executeTool(
  name: unknown,
  rawArgs: unknown,
  registry: ToolRegistry,
  context: ToolRuntimeContext
): Promise<ToolCallResult> {
  if (typeof name !== 'string') {
    context.logger.warn(
      {
        event: 'mcp_tool_call_invalid_name',
        providedNameType: typeof name
      },
      'mcp_tool_call_invalid_name'
    );
    return toolError('Invalid tool call: params.name must be a string.');
  }

  const args = decodeArguments(rawArgs);
  if (!args) {
    context.logger.warn(
      {
        event: 'mcp_tool_call_invalid_arguments',
        toolName: name,
        providedArgumentsType: typeof rawArgs
      },
      'mcp_tool_call_invalid_arguments'
    );
    return toolError('Invalid arguments: expected object or JSON string.');
  }

  const entry = registry.get(name);
  if (!entry) {
    context.logger.warn(
      {
        event: 'mcp_tool_not_found',
        toolName: name
      },
      'mcp_tool_not_found'
    );
    return toolError(`Tool not found: ${name}`);
  }

  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'mcp_tool_execution_started',
      toolName: name,
      args: sanitizeForLog(args)
    },
    'mcp_tool_execution_started'
  );

  const result = await entry.handler(args, context);

  context.logger.info(
    {
      event: 'mcp_tool_execution_completed',
      toolName: name,
      isError: result.isError === true,
      durationMs: Date.now() - startedAt
    },
    'mcp_tool_execution_completed'
  );

  return result;
}
