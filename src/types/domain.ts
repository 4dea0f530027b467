// This file defines forecasting domain types and the per-process server context.

import type { Forecaster } from '../forecast/adapter.js';
import type { ToolRegistry } from '../mcp/tools.js';

export interface ForecastInput {
  ds: string[];
  y: number[];
  periods: number;
}

export interface ForecastRow {
  ds: string;
  yhat: number;
  yhat_lower: number;
  yhat_upper: number;
}

export interface ForecastMeta {
  periods: number;
  n_history: number;
  start: string;
  end: string;
}

export interface ForecastOutput {
  meta: ForecastMeta;
  forecast: ForecastRow[];
}

export interface ForecastFailure {
  error: string;
}

export type ForecastOutcome = ForecastOutput | ForecastFailure;

// This context is built once at startup and shared read-only by every request.
export interface ServerContext {
  authToken: string;
  tools: ToolRegistry;
  forecaster: Forecaster;
  forecastTimeoutMs: number;
}
