import { envelopeSchema, parseEnvelope } from '../contracts/envelope';
import type { AgentEnvelope, SpecialistKind } from '../contracts/envelope';
import type { Specialist } from '../agents/specialist';
import type { AppConfig } from '../config';
import { AgentProtocolError, AgentTransportError, errorMessage } from '../errors';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';

type FetchImpl = typeof fetch;

export type TransportKind = 'direct' | 'http';

export type Specialists = Record<SpecialistKind, Specialist>;

/**
 * One request envelope in, its response envelope out. The router never
 * learns which strategy carried the call.
 */
export interface AgentTransport {
  readonly kind: TransportKind;
  send(recipient: SpecialistKind, envelope: AgentEnvelope): Promise<AgentEnvelope>;
}

/** Checks a reply against the wire schema and the request it answers. */
export function readReplyEnvelope(raw: unknown, request: AgentEnvelope, recipient: SpecialistKind): AgentEnvelope {
  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AgentProtocolError(`Malformed envelope from ${recipient}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const reply = parseEnvelope(parsed.data);
  if (reply.query_id !== request.query_id) {
    throw new AgentProtocolError(`Reply from ${recipient} carries query_id ${reply.query_id}, expected ${request.query_id}`);
  }
  return reply;
}

export class DirectTransport implements AgentTransport {
  readonly kind = 'direct';

  constructor(private readonly agents: Specialists) {}

  async send(recipient: SpecialistKind, envelope: AgentEnvelope): Promise<AgentEnvelope> {
    const reply = await this.agents[recipient].handle(envelope);
    // serialise as the HTTP path would, so both yield the same envelope
    return readReplyEnvelope(JSON.parse(JSON.stringify(reply)), envelope, recipient);
  }
}

export interface HttpTransportOptions {
  urls: Record<SpecialistKind, string>;
  timeoutMs?: number;
  fetch?: FetchImpl;
  logger?: Logger;
}

export class HttpTransport implements AgentTransport {
  readonly kind = 'http';
  private readonly urls: Record<SpecialistKind, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly log: Logger;

  constructor(options: HttpTransportOptions) {
    this.urls = {
      customer_data: options.urls.customer_data.replace(/\/+$/, ''),
      support: options.urls.support.replace(/\/+$/, ''),
    };
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = (options.fetch ?? globalThis.fetch).bind(globalThis);
    this.log = (options.logger ?? rootLogger).child({ component: 'a2a-http' });
  }

  async send(recipient: SpecialistKind, envelope: AgentEnvelope): Promise<AgentEnvelope> {
    const url = `${this.urls[recipient]}/process`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(envelope),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      this.log.error({ err, url }, 'A2A request failed');
      throw new AgentTransportError(`Request to ${recipient} agent failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const detail = await safeReadBody(res);
      throw new AgentTransportError(`${recipient} agent answered ${res.status} ${res.statusText}${detail}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new AgentTransportError(`${recipient} agent sent a body that is not JSON`, { cause: err });
    }
    return readReplyEnvelope(body, envelope, recipient);
  }
}

async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text.slice(0, 200)}` : '';
  } catch {
    return '';
  }
}

export interface TransportDeps {
  /** Required for the in-process strategy. */
  agents?: Specialists;
  fetch?: FetchImpl;
  logger?: Logger;
}

/** Picks the strategy once; callers keep the returned transport for their lifetime. */
export function createTransport(a2a: AppConfig['a2a'], deps: TransportDeps): AgentTransport {
  if (!a2a.useHttp) {
    if (!deps.agents) throw new Error('In-process transport needs the specialist agents');
    return new DirectTransport(deps.agents);
  }
  return new HttpTransport({
    urls: { customer_data: a2a.customerDataUrl, support: a2a.supportUrl },
    timeoutMs: a2a.timeoutMs,
    fetch: deps.fetch,
    logger: deps.logger,
  });
}
