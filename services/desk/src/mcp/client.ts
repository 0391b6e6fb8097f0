import { z } from 'zod';
import {
  JSONRPC_VERSION,
  RpcErrorCode,
  SESSION_HEADER,
  jsonRpcResponseSchema,
  toolResultSchema,
} from '../contracts/jsonrpc';
import type { McpMethod, ToolDescriptor } from '../contracts/jsonrpc';
import { McpToolError, McpTransportError, errorMessage } from '../errors';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import { customerSchema, ticketReceiptSchema, ticketSchema } from '../types';
import type {
  Customer,
  CustomerId,
  CustomerPatch,
  CustomerStatus,
  Ticket,
  TicketPriority,
  TicketReceipt,
} from '../types';
import { extractSseJson } from './sse';

const DEFAULT_BASE_URL = 'http://localhost:8003';
const DEFAULT_TIMEOUT_MS = 30_000;
const BULK_LIMIT = 1000;

type FetchImpl = typeof fetch;

export interface McpClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchImpl;
  logger?: Logger;
}

const initializeResultSchema = z.object({
  protocolVersion: z.string(),
  serverInfo: z.object({ name: z.string(), version: z.string() }),
});

export type InitializeResult = z.infer<typeof initializeResultSchema>;

const toolListSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      inputSchema: z.record(z.unknown()),
    }),
  ),
});

const updateReceiptSchema = z.object({ message: z.string() });

/**
 * Session-scoped JSON-RPC client for the tool server. One instance owns one
 * session id and one request-id sequence; share the instance, not the counters.
 */
export class McpClient {
  private session: string | null = null;
  private nextRequestId = 1;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly log: Logger;

  constructor(options: McpClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const fetchImpl = options.fetch ?? globalThis.fetch;
    this.fetchImpl = fetchImpl.bind(globalThis);
    this.log = (options.logger ?? rootLogger).child({ component: 'mcp-client' });
  }

  get sessionId(): string | null {
    return this.session;
  }

  async initialize(): Promise<InitializeResult> {
    const result = await this.request('initialize');
    const info = initializeResultSchema.parse(result);
    this.log.info({ server: info.serverInfo.name, session: this.session }, 'MCP session initialized');
    return info;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const result = await this.request('tools/list');
    return toolListSchema.parse(result).tools;
  }

  /**
   * Invokes a tool and unwraps `content[0].text` as embedded JSON, falling back
   * to `{ raw: text }`. Tool-reported failures raise `McpToolError`.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    const result = await this.request('tools/call', { name, arguments: args });
    const [first] = toolResultSchema.parse(result).content;
    if (!first) return {};

    const text = first.text ?? '{}';
    try {
      return JSON.parse(text);
    } catch {
      return { raw: text };
    }
  }

  // ---------- Typed helpers ----------

  /** `null` when the server reports the customer as not found; every other failure throws. */
  async getCustomer(customerId: CustomerId): Promise<Customer | null> {
    try {
      return await this.readTool('get_customer', { customer_id: customerId }, customerSchema);
    } catch (err) {
      if (err instanceof McpToolError && err.code === RpcErrorCode.NotFound) return null;
      throw err;
    }
  }

  listCustomers(status: CustomerStatus, limit = 100): Promise<Customer[]> {
    return this.readTool('list_customers', { status, limit }, z.array(customerSchema));
  }

  async updateCustomer(customerId: CustomerId, data: CustomerPatch): Promise<void> {
    await this.readTool('update_customer', { customer_id: customerId, data }, updateReceiptSchema);
  }

  createTicket(customerId: CustomerId, issue: string, priority: TicketPriority): Promise<TicketReceipt> {
    return this.readTool('create_ticket', { customer_id: customerId, issue, priority }, ticketReceiptSchema);
  }

  getCustomerHistory(customerId: CustomerId): Promise<Ticket[]> {
    return this.readTool('get_customer_history', { customer_id: customerId }, z.array(ticketSchema));
  }

  /**
   * There is no priority query on the server, so this walks each customer's
   * history in turn (every active customer when no ids are given).
   */
  async getTicketsByPriority(priority: TicketPriority, customerIds?: CustomerId[]): Promise<Ticket[]> {
    const ids = customerIds ?? (await this.listCustomers('active', BULK_LIMIT)).map((c) => c.id);
    const tickets: Ticket[] = [];
    for (const id of ids) {
      tickets.push(...(await this.getCustomerHistory(id)));
    }
    return tickets.filter((t) => t.priority === priority);
  }

  getCustomersByStatus(status: CustomerStatus): Promise<Customer[]> {
    return this.listCustomers(status, BULK_LIMIT);
  }

  // ---------- Transport ----------

  private async readTool<T>(
    name: string,
    args: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const parsed = schema.safeParse(await this.callTool(name, args));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'result'}: ${i.message}`).join('; ');
      throw new McpTransportError(`Unexpected ${name} result: ${issues}`);
    }
    return parsed.data;
  }

  private async request(method: McpMethod, params: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
    const id = this.nextRequestId++;
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      accept: 'application/json, text/event-stream',
    };
    if (this.session) headers[SESSION_HEADER] = this.session;

    let res: Response;
    let body: string;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/mcp`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ jsonrpc: JSONRPC_VERSION, id, method, params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await res.text();
    } catch (err) {
      this.log.error({ err, method }, 'MCP HTTP request failed');
      throw new McpTransportError(`MCP ${method} request failed: ${errorMessage(err)}`, { cause: err });
    }

    const issued = res.headers.get(SESSION_HEADER);
    if (issued && !this.session) this.session = issued;

    if (!res.ok) {
      const detail = body ? ` - ${body.slice(0, 200)}` : '';
      throw new McpTransportError(`MCP ${method} failed: ${res.status} ${res.statusText}${detail}`);
    }

    const parsed = jsonRpcResponseSchema.safeParse(decodeBody(body));
    if (!parsed.success) {
      throw new McpTransportError(`Malformed JSON-RPC response to ${method}: ${body.slice(0, 200)}`);
    }

    const message = parsed.data;
    if ('error' in message) {
      throw new McpToolError(message.error.code, message.error.message);
    }
    return message.result;
  }
}

/**
 * JSON body first; otherwise an event-stream body whose `data:` line holds the
 * same payload.
 */
export function decodeBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    const fromSse = extractSseJson(body);
    if (fromSse === undefined) {
      throw new McpTransportError(`No JSON or SSE data in response: ${body.slice(0, 200)}`);
    }
    return fromSse;
  }
}
