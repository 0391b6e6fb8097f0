import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { McpToolError, McpTransportError } from '../src/errors';
import { McpClient, decodeBody } from '../src/mcp/client';
import { buildMcpApp } from '../src/server';
import { MemoryCustomerStore } from '../src/storage/memoryCustomerStore';
import { seedStore } from '../src/storage/seed';
import type { Customer } from '../src/types';
import { injectFetch } from './helpers/injectFetch';

const SEEDED_AT = '2024-05-01T12:00:00.000Z';

class UnreachableStore extends MemoryCustomerStore {
  async listCustomers(): Promise<Customer[]> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
  }
}

type AppInstance = Awaited<ReturnType<typeof buildMcpApp>>;
let app: AppInstance;

beforeAll(async () => {
  const store = new MemoryCustomerStore(() => new Date(SEEDED_AT));
  await seedStore(store);
  app = await buildMcpApp({ store });
});

afterAll(async () => {
  await app.close();
});

function client() {
  return new McpClient({ baseUrl: 'http://mcp.test/', fetch: injectFetch(app) });
}

describe('McpClient against the in-process server', () => {
  it('keeps the first session id and sends it on every later call', async () => {
    const fetchSpy = vi.fn(injectFetch(app));
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: fetchSpy });
    expect(c.sessionId).toBeNull();

    const info = await c.initialize();
    expect(info).toEqual({ protocolVersion: '2024-11-05', serverInfo: { name: 'customer-desk-mcp', version: '1.0.0' } });
    const session = c.sessionId;
    expect(session).not.toBeNull();

    await c.listTools();
    const [, second] = fetchSpy.mock.calls;
    const headers = new Headers(second[1]?.headers);
    expect(headers.get('mcp-session-id')).toBe(session);
    expect(c.sessionId).toBe(session);
  });

  it('numbers requests monotonically', async () => {
    const fetchSpy = vi.fn(injectFetch(app));
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: fetchSpy });
    await c.initialize();
    await c.listTools();
    await c.callTool('get_customer', { customer_id: 1 });

    const ids = fetchSpy.mock.calls.map(([, init]) => JSON.parse(String(init?.body)).id);
    expect(ids).toEqual([1, 2, 3]);
  });

  it('unwraps a tool result from its text content', async () => {
    const result = await client().callTool('get_customer', { customer_id: 1 });
    expect(result).toMatchObject({ id: 1, name: 'Alice Johnson', email: 'alice@example.com' });
  });

  it('returns null for a customer that does not exist', async () => {
    await expect(client().getCustomer(999)).resolves.toBeNull();
  });

  it('raises McpToolError from callTool when the server reports an error', async () => {
    const error = await client()
      .callTool('get_customer', { customer_id: 999 })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(McpToolError);
    expect(error).toMatchObject({
      code: -32001,
      message: 'MCP Error: Customer 999 not found',
      detail: 'Customer 999 not found',
    });
  });

  it('collects high-priority tickets across the given customers in order', async () => {
    const tickets = await client().getTicketsByPriority('high', [12345, 2]);
    expect(tickets.map((t) => [t.id, t.customer_id])).toEqual([
      [4, 12345],
      [3, 2],
    ]);
  });

  it('walks every active customer when no ids are given', async () => {
    const tickets = await client().getTicketsByPriority('low');
    expect(tickets.map((t) => t.id)).toEqual([2, 5]);
  });

  it('raises the server message when an update is rejected', async () => {
    const error = await client()
      .updateCustomer(1, {})
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(McpToolError);
    expect(error).toMatchObject({
      code: -32603,
      message: 'MCP Error: No valid fields to update',
      detail: 'No valid fields to update',
    });
  });

  it('raises instead of returning an empty list when the store fails', async () => {
    const failing = await buildMcpApp({ store: new UnreachableStore(() => new Date(SEEDED_AT)) });
    try {
      const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: injectFetch(failing) });
      const error = await c.listCustomers('active').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(McpToolError);
      expect(error).toMatchObject({ code: -32603, detail: 'connect ECONNREFUSED 127.0.0.1:6379' });
      await expect(c.getTicketsByPriority('high')).rejects.toBeInstanceOf(McpToolError);
    } finally {
      await failing.close();
    }
  });
});

describe('McpClient transport handling', () => {
  it('falls back to an SSE body when the response is not JSON', async () => {
    const payload = { jsonrpc: '2.0', id: 1, result: { content: [{ type: 'text', text: '{"id":42}' }] } };
    const fetchImpl = vi.fn(
      async () =>
        new Response(`event: message\ndata: ${JSON.stringify(payload)}\n\n`, {
          status: 200,
          headers: { 'content-type': 'text/event-stream', 'mcp-session-id': 'sse-session' },
        }),
    );
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: fetchImpl });

    await expect(c.callTool('get_customer', { customer_id: 42 })).resolves.toEqual({ id: 42 });
    expect(c.sessionId).toBe('sse-session');
  });

  it('keeps non-JSON tool text as raw', async () => {
    const payload = { jsonrpc: '2.0', id: 1, result: { content: [{ type: 'text', text: 'plain words' }] } };
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: async () => Response.json(payload) });
    await expect(c.callTool('anything', {})).resolves.toEqual({ raw: 'plain words' });
  });

  it('turns an empty content list into an empty object', async () => {
    const payload = { jsonrpc: '2.0', id: 1, result: { content: [] } };
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: async () => Response.json(payload) });
    await expect(c.callTool('anything', {})).resolves.toEqual({});
  });

  it('fails with McpTransportError on a non-2xx status', async () => {
    const c = new McpClient({
      baseUrl: 'http://mcp.test',
      fetch: async () => new Response('upstream down', { status: 502, statusText: 'Bad Gateway' }),
    });
    await expect(c.initialize()).rejects.toThrow(
      new McpTransportError('MCP initialize failed: 502 Bad Gateway - upstream down'),
    );
  });

  it('fails with McpTransportError when the connection fails', async () => {
    const c = new McpClient({
      baseUrl: 'http://mcp.test',
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(c.listTools()).rejects.toBeInstanceOf(McpTransportError);
  });

  it('lets transport errors through the typed helpers', async () => {
    const c = new McpClient({
      baseUrl: 'http://mcp.test',
      fetch: async () => new Response('nope', { status: 500 }),
    });
    await expect(c.getCustomer(1)).rejects.toBeInstanceOf(McpTransportError);
  });
});

describe('McpClient result validation', () => {
  const answering = (text: string) => async () =>
    Response.json({ jsonrpc: '2.0', id: 1, result: { content: [{ type: 'text', text }] } });

  it('rejects a customer of the wrong shape', async () => {
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: answering('{"id":"x"}') });
    const error = await c.getCustomer(1).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(McpTransportError);
    const leading = 'Unexpected get_customer result: id: Expected number, received string; name: Required;';
    expect(error).toMatchObject({ message: expect.stringContaining(leading) });
  });

  it('rejects a ticket list that is not an array', async () => {
    const c = new McpClient({ baseUrl: 'http://mcp.test', fetch: answering('{"tickets":[]}') });
    await expect(c.getCustomerHistory(1)).rejects.toThrow(
      new McpTransportError('Unexpected get_customer_history result: result: Expected array, received object'),
    );
  });
});

describe('decodeBody', () => {
  it('prefers JSON and falls back to the first parseable data line', () => {
    expect(decodeBody('{"a":1}')).toEqual({ a: 1 });
    expect(decodeBody('data: not json\ndata: {"b":2}\n\n')).toEqual({ b: 2 });
  });

  it('throws when neither form parses', () => {
    expect(() => decodeBody('<html>oops</html>')).toThrow(McpTransportError);
  });
});
