// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import pino, { type Logger, type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

const MAX_LOG_DEPTH = 5;
const MAX_LOG_STRING_LENGTH = 1024;
const MAX_LOG_OBJECT_KEYS = 30;
// Long series (ds/y) are logged as a length plus edge samples.
const SERIES_SAMPLE_SIZE = 3;
const MAX_INLINE_ARRAY_ITEMS = 2 * SERIES_SAMPLE_SIZE;

const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  '*.authorization',
  '*.cookie',
  '*.token',
  '*.authToken'
];

// This helper returns true for field names that should never be logged in cleartext.
function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes('token') ||
    normalized.includes('authorization') ||
    normalized.includes('cookie') ||
    normalized.includes('secret')
  );
}

function truncateString(value: string): string {
  if (value.length <= MAX_LOG_STRING_LENGTH) {
    return value;
  }

  return `${value.slice(0, MAX_LOG_STRING_LENGTH)}...[truncated:${value.length - MAX_LOG_STRING_LENGTH}]`;
}

// This helper returns a stable short hash to correlate sensitive values without exposing them.
function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

// This helper sanitizes arbitrary payloads recursively, collapsing long arrays into edge samples.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    if (value.length <= MAX_INLINE_ARRAY_ITEMS) {
      return value.map((item) => sanitizeForLog(item, depth + 1));
    }

    return {
      length: value.length,
      head: value.slice(0, SERIES_SAMPLE_SIZE).map((item) => sanitizeForLog(item, depth + 1)),
      tail: value.slice(-SERIES_SAMPLE_SIZE).map((item) => sanitizeForLog(item, depth + 1))
    };
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const target: Record<string, unknown> = {};

    for (const [key, entryValue] of entries.slice(0, MAX_LOG_OBJECT_KEYS)) {
      if (isSensitiveKey(key)) {
        const serialized = typeof entryValue === 'string' ? entryValue : JSON.stringify(entryValue ?? '');
        target[key] = `[redacted:${shortHash(serialized)}]`;
        continue;
      }

      target[key] = sanitizeForLog(entryValue, depth + 1);
    }

    if (entries.length > MAX_LOG_OBJECT_KEYS) {
      target.__truncatedKeys = entries.length - MAX_LOG_OBJECT_KEYS;
    }

    return target;
  }

  return String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// Used before the HTTP app (and its logger) exists, e.g. for configuration failures.
export function createBootstrapLogger(level = 'info'): Logger {
  return pino(buildLoggerOptions(level));
}
