// This test suite verifies bearer token parsing and the MCP auth guard.

import type { FastifyReply, FastifyRequest } from 'fastify';
import pino from 'pino';
import { describe, expect, it } from 'vitest';
import {
  INVALID_TOKEN_MESSAGE,
  MISSING_AUTH_MESSAGE,
  constantTimeEquals,
  createMcpAuthGuard,
  extractBearerToken
} from '../src/http/auth.js';
import { AppError } from '../src/utils/errors.js';

// This helper builds the request/reply surface the guard touches.
function makeExchange(authorization?: string) {
  const headers: Record<string, string> = {};
  const request = {
    id: 'req-1',
    headers: authorization === undefined ? {} : { authorization },
    log: pino({ enabled: false })
  } as unknown as FastifyRequest;
  const reply = {
    header: (name: string, value: string) => {
      headers[name] = value;
      return reply;
    }
  } as unknown as FastifyReply;

  return { request, reply, headers };
}

describe('auth helpers', () => {
  it('extracts bearer token from header', () => {
    expect(extractBearerToken('Bearer abc123')).toBe('abc123');
    expect(extractBearerToken('bearer abc123')).toBe('abc123');
    expect(extractBearerToken('Basic abc123')).toBeNull();
    expect(extractBearerToken('Bearer')).toBeNull();
    expect(extractBearerToken(undefined)).toBeNull();
  });

  it('compares secrets exactly', () => {
    expect(constantTimeEquals('test-secret', 'test-secret')).toBe(true);
    expect(constantTimeEquals('test-secret', 'test-secreT')).toBe(false);
    expect(constantTimeEquals('test-secret', 'test')).toBe(false);
  });
});

describe('mcp auth guard', () => {
  const guard = createMcpAuthGuard('test-secret');

  it('accepts the configured token', () => {
    const { request, reply, headers } = makeExchange('Bearer test-secret');

    expect(() => guard(request, reply)).not.toThrow();
    expect(headers).toEqual({});
  });

  it('rejects a missing header with a bearer challenge', () => {
    const { request, reply, headers } = makeExchange();

    expect(() => guard(request, reply)).toThrowError(new AppError(401, 'unauthorized', MISSING_AUTH_MESSAGE));
    expect(headers['WWW-Authenticate']).toBe('Bearer realm="mcp"');
  });

  it('rejects a mismatching token', () => {
    const { request, reply, headers } = makeExchange('Bearer other-secret');

    try {
      guard(request, reply);
      expect.unreachable('guard should reject a mismatching token');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ statusCode: 401, code: 'unauthorized', message: INVALID_TOKEN_MESSAGE });
    }
    expect(headers['WWW-Authenticate']).toBe('Bearer realm="mcp", error="invalid_token"');
  });
});
