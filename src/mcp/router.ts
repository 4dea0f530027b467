// This module maps JSON-RPC method names to handlers with one uniform signature.

import type { FastifyBaseLogger } from 'fastify';
import type { ServerContext } from '../types/domain.js';
import type { InitializeResult, ToolCallResult, ToolsListResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { executeTool } from './tools.js';

export interface MethodContext {
  server: ServerContext;
  logger: FastifyBaseLogger;
}

export type MethodHandler = (params: Record<string, unknown>, context: MethodContext) => Promise<unknown>;

export const TOOLS_CALL_METHOD = 'tools/call';

// Input-independent; every call yields the same descriptor.
async function handleInitialize(): Promise<InitializeResult> {
  return {
    protocolVersion: MCP_PROTOCOL_VERSION,
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    },
    capabilities: {
      tools: {}
    }
  };
}

async function handleToolsList(_params: Record<string, unknown>, context: MethodContext): Promise<ToolsListResult> {
  return { tools: context.server.tools.list() };
}

async function handleToolsCall(params: Record<string, unknown>, context: MethodContext): Promise<ToolCallResult> {
  context.logger.info(
    {
      event: 'mcp_tool_call_requested',
      toolName: sanitizeForLog(params.name),
      arguments: sanitizeForLog(params.arguments ?? {})
    },
    'mcp_tool_call_requested'
  );

  return executeTool(params.name, params.arguments, context.server.tools, {
    forecaster: context.server.forecaster,
    forecastTimeoutMs: context.server.forecastTimeoutMs,
    logger: context.logger
  });
}

const methodHandlers: ReadonlyMap<string, MethodHandler> = new Map<string, MethodHandler>([
  ['initialize', handleInitialize],
  ['tools/list', handleToolsList],
  [TOOLS_CALL_METHOD, handleToolsCall]
]);

// This function dispatches one request method and raises method_not_found for anything outside the table.
export async function dispatchMethod(
  method: string,
  params: Record<string, unknown>,
  context: MethodContext
): Promise<unknown> {
  const handler = methodHandlers.get(method);
  if (!handler) {
    throw new AppError(404, 'method_not_found', `Method not found: ${method}`);
  }

  return handler(params, context);
}
