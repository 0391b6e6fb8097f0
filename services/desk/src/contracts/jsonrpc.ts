import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
export const SESSION_HEADER = 'Mcp-Session-Id';

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  // implementation-defined server error range
  NotFound: -32001,
} as const;

export type McpMethod = 'initialize' | 'tools/list' | 'tools/call';

const rpcId = z.union([z.number().int(), z.string()]).nullable();

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: rpcId.default(null),
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export type JsonRpcRequest = z.infer<typeof jsonRpcRequestSchema>;
export type JsonRpcId = JsonRpcRequest['id'];

export const jsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
});

export const jsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: rpcId,
    error: jsonRpcErrorSchema,
  }),
  z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: rpcId,
    result: z.record(z.unknown()),
  }),
]);

export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

/** Text block carrying a tool's structured result as embedded JSON. */
export interface ToolContent {
  type: 'text';
  text: string;
}

export const toolResultSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
      }),
    )
    .default([]),
});

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export function rpcResult(id: JsonRpcId, result: Record<string, unknown>): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}
