// This module implements the HTTP JSON-RPC endpoint: raw parsing, auth, notification handling and envelope shaping.

import { randomUUID } from 'node:crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { createMcpAuthGuard } from '../http/auth.js';
import type { ServerContext } from '../types/domain.js';
import type { JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { isJsonObject, previewJson, tryParseJson } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import { TOOLS_CALL_METHOD, dispatchMethod } from './router.js';
import { formatValidationIssues } from './tool-schemas.js';
import { toolError } from './tools.js';

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_UNAUTHORIZED = -32000;

const NOTIFICATION_PREFIX = 'notifications/';
const PREVIEW_METHODS = new Set(['tools/list', TOOLS_CALL_METHOD]);

const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.string(), z.number()]),
  method: z.string(),
  params: z.record(z.unknown()).optional()
});

// This helper creates a canonical JSON-RPC error payload.
function rpcError(id: JsonRpcId | null, code: number, message: string): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    error: {
      code,
      message
    },
    id
  };
}

function rpcResult(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    result,
    id
  };
}

// This helper keeps only id values a response may echo back.
function toResponseId(value: unknown): JsonRpcId | null {
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

// This function handles one POST /mcp exchange end to end.
async function handleMcpPost(
  request: FastifyRequest,
  reply: FastifyReply,
  context: ServerContext,
  authGuard: ReturnType<typeof createMcpAuthGuard>
): Promise<void> {
  const requestLogger = request.log.child({ component: 'mcp' });
  const parsed = tryParseJson(typeof request.body === 'string' ? request.body : '');

  if (!parsed.ok) {
    requestLogger.warn(
      {
        event: 'mcp_post_parse_error',
        message: parsed.message
      },
      'mcp_post_parse_error'
    );
    reply.code(200).send(rpcError(null, RPC_PARSE_ERROR, `Parse error: ${parsed.message}`));
    return;
  }

  const payload = parsed.value;
  const rawId = isJsonObject(payload) ? payload.id : undefined;
  const rawMethod = isJsonObject(payload) ? payload.method : undefined;
  const responseId = toResponseId(rawId);

  try {
    authGuard(request, reply);
  } catch (error) {
    const appError = normalizeError(error);
    reply.code(appError.statusCode).send(rpcError(responseId, RPC_UNAUTHORIZED, appError.message));
    return;
  }

  if (rawId === undefined || rawId === null) {
    const method = typeof rawMethod === 'string' ? rawMethod : null;
    const event =
      method !== null && method.startsWith(NOTIFICATION_PREFIX) ? 'mcp_notification_handled' : 'mcp_notification_unknown';
    requestLogger.info({ event, method }, event);
    reply.code(204).send();
    return;
  }

  const envelope = jsonRpcRequestSchema.safeParse(payload);
  if (!envelope.success) {
    requestLogger.warn(
      {
        event: 'mcp_post_invalid_request_object',
        rpcRequestId: responseId,
        issues: formatValidationIssues(envelope.error)
      },
      'mcp_post_invalid_request_object'
    );
    reply
      .code(200)
      .send(rpcError(responseId, RPC_INVALID_REQUEST, `Invalid Request: ${formatValidationIssues(envelope.error)}`));
    return;
  }

  const { id, method, params } = envelope.data;
  const startedAt = Date.now();
  const rpcLogger = requestLogger.child({ rpcTraceId: randomUUID(), rpcRequestId: id, method });
  rpcLogger.info({ event: 'mcp_rpc_request_received' }, 'mcp_rpc_request_received');

  try {
    const result = await dispatchMethod(method, params ?? {}, { server: context, logger: rpcLogger });

    if (PREVIEW_METHODS.has(method)) {
      rpcLogger.info(
        {
          event: 'mcp_rpc_result_preview',
          preview: previewJson(result)
        },
        'mcp_rpc_result_preview'
      );
    }

    reply.code(200).send(rpcResult(id, result));
  } catch (error) {
    const appError = normalizeError(error);

    if (appError.code === 'method_not_found') {
      rpcLogger.warn({ event: 'mcp_rpc_method_not_found' }, 'mcp_rpc_method_not_found');
      reply.code(200).send(rpcError(id, RPC_METHOD_NOT_FOUND, appError.message));
      return;
    }

    rpcLogger.error(
      {
        event: 'mcp_rpc_request_failed',
        code: appError.code,
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    // tools/call failures are reported as tool results, never as RPC errors.
    if (method === TOOLS_CALL_METHOD) {
      reply.code(200).send(rpcResult(id, toolError(`Internal tool error: ${appError.message}`)));
      return;
    }

    reply.code(200).send(rpcError(id, RPC_INTERNAL_ERROR, `Internal error: ${appError.message}`));
  } finally {
    rpcLogger.info(
      {
        event: 'mcp_rpc_request_completed',
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// This function registers the MCP route in its own scope so the raw-body parser does not leak to other routes.
export function registerMcpRoutes(fastify: FastifyInstance, context: ServerContext): void {
  const authGuard = createMcpAuthGuard(context.authToken);

  void fastify.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post('/mcp', async (request, reply) => {
      await handleMcpPost(request, reply, context, authGuard);
    });
  });
}
