// This module wires the server context, the MCP route, request logging hooks and fallback error handling.

import Fastify, { type FastifyInstance } from 'fastify';
import type { ServerConfig } from './config/env.js';
import { AdditiveForecaster, type Forecaster } from './forecast/adapter.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { createToolRegistry, type ToolRegistry } from './mcp/tools.js';
import type { ServerContext } from './types/domain.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export type AppConfig = Pick<ServerConfig, 'authToken' | 'forecastTimeoutMs' | 'logLevel'>;

export interface ServerOptions {
  // false silences logging (tests).
  logger?: boolean;
  forecaster?: Forecaster;
  tools?: ToolRegistry;
}

export interface ServerResources {
  app: FastifyInstance;
  context: ServerContext;
}

const BODY_LIMIT_BYTES = 1024 * 1024;

// This helper builds the immutable per-process context injected into every MCP request.
export function createServerContext(
  config: AppConfig,
  forecaster: Forecaster,
  tools: ToolRegistry = createToolRegistry()
): ServerContext {
  return Object.freeze({
    authToken: config.authToken,
    tools,
    forecaster,
    forecastTimeoutMs: config.forecastTimeoutMs
  });
}

// This function builds and configures the full HTTP application.
export function createServer(config: AppConfig, options: ServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(config.logLevel),
    bodyLimit: BODY_LIMIT_BYTES
  });

  const context = createServerContext(config, options.forecaster ?? new AdditiveForecaster(app.log), options.tools);

  app.addHook('onRequest', async (request) => {
    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  registerMcpRoutes(app, context);

  // This handler maps errors raised outside the MCP envelope logic (e.g. oversized bodies) into structured JSON.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status =
      error instanceof AppError ? normalized.statusCode : typeof error.statusCode === 'number' ? error.statusCode : 500;

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    context
  };
}
