// This module defines MCP tool input contracts as zod schemas and derives the advertised JSON schemas from them.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool, McpToolAnnotations } from '../types/mcp.js';

export const FORECAST_TOOL_NAME = 'forecast_time_series';
export const DEFAULT_FORECAST_PERIODS = 10;
export const MAX_FORECAST_PERIODS = 10_000;

export const forecastTimeSeriesSchema = z
  .object({
    ds: z
      .array(z.string())
      .min(1)
      .describe('List of dates in ISO format (e.g., YYYY-MM-DD).'),
    y: z
      .array(z.number())
      .min(1)
      .describe('List of numeric values aligned with ds.'),
    periods: z
      .number()
      .int()
      .positive()
      .max(MAX_FORECAST_PERIODS)
      .default(DEFAULT_FORECAST_PERIODS)
      .describe('Number of future periods to forecast.')
  })
  .strict()
  .superRefine((payload, ctx) => {
    // This rule rejects misaligned series before any model work starts.
    if (payload.ds.length !== payload.y.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['y'],
        message: `Expected ${payload.ds.length} values aligned with ds, received ${payload.y.length}.`
      });
    }
  });

export type ForecastTimeSeriesArgs = z.infer<typeof forecastTimeSeriesSchema>;

export interface ToolContract {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  annotations: McpToolAnnotations;
}

export const toolContracts: readonly ToolContract[] = [
  {
    name: FORECAST_TOOL_NAME,
    description:
      'Fits an additive trend and seasonality model on ds/y and returns ds + yhat/yhat_lower/yhat_upper for history and future periods.',
    schema: forecastTimeSeriesSchema,
    annotations: { read_only: false }
  }
];

// This helper renders one zod contract as an inline JSON schema without $ref indirection.
export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _ignored, ...inputSchema } = zodToJsonSchema(schema, {
    $refStrategy: 'none',
    target: 'jsonSchema7'
  }) as Record<string, unknown>;
  return inputSchema;
}

// This function returns the MCP tool descriptors advertised by tools/list.
export function buildToolList(): McpTool[] {
  return toolContracts.map((contract) => ({
    name: contract.name,
    description: contract.description,
    inputSchema: toInputSchema(contract.schema),
    annotations: { ...contract.annotations }
  }));
}

// This helper formats zod issues as one line per violated field for tool-level error text.
export function formatValidationIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
