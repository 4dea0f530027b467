// This module contains the bearer token guard for the MCP endpoint.

import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../utils/errors.js';

export const MISSING_AUTH_MESSAGE = 'Unauthorized: Missing or invalid Authorization header';
export const INVALID_TOKEN_MESSAGE = 'Unauthorized: Invalid MCP Auth token';

const BEARER_CHALLENGE = 'Bearer realm="mcp"';

// This helper extracts bearer tokens from Authorization headers.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const [scheme, token] = authHeader.split(' ', 2);
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

// This helper compares secrets in constant time to reduce timing side-channel leakage.
export function constantTimeEquals(left: string, right: string): boolean {
  const leftBuffer = Buffer.from(left, 'utf8');
  const rightBuffer = Buffer.from(right, 'utf8');

  if (leftBuffer.length !== rightBuffer.length) {
    return false;
  }

  return timingSafeEqual(leftBuffer, rightBuffer);
}

// This guard accepts exactly the configured secret and raises 401 AppErrors otherwise.
export function createMcpAuthGuard(authToken: string) {
  return function mcpAuthGuard(request: FastifyRequest, reply: FastifyReply): void {
    const token = extractBearerToken(request.headers.authorization);
    if (!token) {
      request.log.warn(
        {
          event: 'mcp_auth_missing_bearer',
          requestId: request.id
        },
        'mcp_auth_missing_bearer'
      );
      reply.header('WWW-Authenticate', BEARER_CHALLENGE);
      throw new AppError(401, 'unauthorized', MISSING_AUTH_MESSAGE);
    }

    if (!constantTimeEquals(token, authToken)) {
      request.log.warn(
        {
          event: 'mcp_auth_invalid_bearer',
          requestId: request.id
        },
        'mcp_auth_invalid_bearer'
      );
      reply.header('WWW-Authenticate', `${BEARER_CHALLENGE}, error="invalid_token"`);
      throw new AppError(401, 'unauthorized', INVALID_TOKEN_MESSAGE);
    }

    request.log.debug(
      {
        event: 'mcp_auth_success',
        requestId: request.id
      },
      'mcp_auth_success'
    );
  };
}
