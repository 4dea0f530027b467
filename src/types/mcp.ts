// This file defines JSON-RPC envelope and MCP payload types used by the HTTP transport and router.

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc?: '2.0';
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId | null; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId | null; error: JsonRpcError };

export interface McpToolAnnotations {
  read_only: boolean;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  annotations: McpToolAnnotations;
}

export interface McpTextContent {
  type: 'text';
  text: string;
}

// Successful results omit isError entirely.
export interface ToolCallResult {
  content: McpTextContent[];
  isError?: true;
}

export interface InitializeResult {
  protocolVersion: string;
  serverInfo: {
    name: string;
    version: string;
  };
  capabilities: {
    tools: Record<string, never>;
  };
}

export interface ToolsListResult {
  tools: McpTool[];
}
