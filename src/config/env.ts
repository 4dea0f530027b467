// This module validates process environment into the typed configuration the server starts from.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
  MCP_TOKEN: z.string().min(1, 'MCP_TOKEN must be set to the bearer secret.'),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FORECAST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
});

export interface ServerConfig {
  authToken: string;
  host: string;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  forecastTimeoutMs: number;
}

// This function reads and validates configuration, raising invalid_config with per-variable details.
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid server configuration.', parsed.error.flatten().fieldErrors);
  }

  return {
    authToken: parsed.data.MCP_TOKEN,
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    forecastTimeoutMs: parsed.data.FORECAST_TIMEOUT_MS
  };
}
