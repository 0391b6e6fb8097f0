import type { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { CustomerStore } from '../contracts/customerStore';
import {
  MCP_PROTOCOL_VERSION,
  RpcErrorCode,
  SESSION_HEADER,
  jsonRpcRequestSchema,
  rpcError,
  rpcResult,
  toolCallParamsSchema,
} from '../contracts/jsonrpc';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse, ToolContent } from '../contracts/jsonrpc';
import { errorMessage } from '../errors';
import type { SessionRegistry } from '../mcp/sessions';
import { sseEvent } from '../mcp/sse';
import { TOOL_CATALOG, executeTool } from '../mcp/tools';

export interface McpRouteDeps {
  store: CustomerStore;
  sessions: SessionRegistry;
  serverName?: string;
  serverVersion?: string;
}

// ---------- Schemas ----------
const directCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

// ---------- Helpers ----------
function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function idOf(body: unknown): JsonRpcId {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const { id } = body;
    if (typeof id === 'number' || typeof id === 'string') return id;
  }
  return null;
}

function withSession(reply: FastifyReply, sessionId: string) {
  return reply.header(SESSION_HEADER, sessionId);
}

function isBodyParseFailure(err: FastifyError): boolean {
  return (
    err instanceof SyntaxError ||
    err.code === 'FST_ERR_CTP_EMPTY_JSON_BODY' ||
    err.code === 'FST_ERR_CTP_INVALID_JSON_BODY'
  );
}

// ---------- Routes ----------
export async function registerMcpRoutes(app: FastifyInstance, deps: McpRouteDeps) {
  const { store, sessions } = deps;
  const serverInfo = {
    name: deps.serverName ?? 'customer-desk-mcp',
    version: deps.serverVersion ?? '1.0.0',
  };

  async function dispatch(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const { id, method, params } = request;
    switch (method) {
      case 'initialize':
        return rpcResult(id, {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo,
        });
      case 'tools/list':
        return rpcResult(id, { tools: TOOL_CATALOG });
      case 'tools/call': {
        const call = toolCallParamsSchema.safeParse(params);
        if (!call.success) {
          return rpcError(id, RpcErrorCode.InvalidParams, 'Invalid params: tool name required');
        }
        const outcome = await executeTool(store, call.data.name, call.data.arguments);
        if (!outcome.success) {
          return rpcError(id, outcome.code ?? RpcErrorCode.InternalError, outcome.error);
        }
        const content: ToolContent[] = [{ type: 'text', text: JSON.stringify(outcome.result, null, 2) }];
        return rpcResult(id, { content });
      }
      default:
        return rpcError(id, RpcErrorCode.MethodNotFound, `Method not found: ${method}`);
    }
  }

  // A body that is not JSON fails before the route runs; answer it in JSON-RPC terms.
  app.setErrorHandler((err, req, reply) => {
    if (req.url.split('?')[0] !== '/mcp' || !isBodyParseFailure(err)) return reply.send(err);

    const session = sessions.resolve(headerValue(req.headers['mcp-session-id']));
    const response = rpcError(null, RpcErrorCode.ParseError, 'Parse error');
    sessions.enqueue(session, response);
    return withSession(reply, session.id).code(400).send(response);
  });

  // Client-to-server messages; always answered with a JSON body.
  app.post('/mcp', async (req, reply) => {
    const session = sessions.resolve(headerValue(req.headers['mcp-session-id']));
    withSession(reply, session.id);

    const parsed = jsonRpcRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const response = rpcError(idOf(req.body), RpcErrorCode.InvalidRequest, 'Invalid Request');
      sessions.enqueue(session, response);
      return reply.code(400).send(response);
    }

    try {
      const response = await dispatch(parsed.data);
      sessions.enqueue(session, response);
      return reply.send(response);
    } catch (err) {
      req.log.error({ err, method: parsed.data.method }, 'MCP request failed');
      const response = rpcError(parsed.data.id, RpcErrorCode.InternalError, errorMessage(err));
      sessions.enqueue(session, response);
      return reply.code(500).send(response);
    }
  });

  // Server-to-client replay: flushes what the session has queued as SSE and ends.
  app.get('/mcp', async (req, reply) => {
    const session = sessions.resolve(headerValue(req.headers['mcp-session-id']));
    const body = sessions.drain(session).map(sseEvent).join('');
    return withSession(reply, session.id)
      .header('Content-Type', 'text/event-stream')
      .header('Cache-Control', 'no-cache')
      .send(body);
  });

  // Direct endpoints, handy for poking the server without JSON-RPC framing
  app.get('/tools/list', async () => ({ tools: TOOL_CATALOG }));

  app.post('/tools/call', async (req, reply) => {
    const parsed = directCallSchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const outcome = await executeTool(store, parsed.data.name, parsed.data.arguments);
    return reply.send(outcome);
  });
}
