import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { Specialist } from '../src/agents/specialist';
import { CUSTOMER_DATA_AGENT_CARD, SUPPORT_AGENT_CARD } from '../src/agents/cards';
import { createEnvelope, replyTo } from '../src/contracts/envelope';
import type { AgentEnvelope } from '../src/contracts/envelope';
import { AgentProtocolError, AgentTransportError } from '../src/errors';
import { DirectTransport, HttpTransport, createTransport, readReplyEnvelope } from '../src/transport/agentTransport';
import { buildDesk } from './helpers/desk';
import type { Desk } from './helpers/desk';

function dataRequest(queryId: string) {
  return createEnvelope({
    from: 'router',
    to: 'customer_data',
    type: 'request',
    content: { action: 'get_customer', customer_id: 2 },
    queryId,
  });
}

/** Specialist that answers whatever the test tells it to. */
function scripted(answer: (envelope: AgentEnvelope) => AgentEnvelope): Specialist {
  return {
    kind: 'customer_data',
    card: CUSTOMER_DATA_AGENT_CARD,
    handle: async (envelope) => answer(envelope),
    initialize: async () => undefined,
  };
}

const idleSupport: Specialist = {
  kind: 'support',
  card: SUPPORT_AGENT_CARD,
  handle: async (envelope) => replyTo(envelope, { success: true }),
  initialize: async () => undefined,
};

const A2A = {
  useHttp: false,
  customerDataUrl: 'http://data.test',
  supportUrl: 'http://support.test',
  timeoutMs: 1000,
};

describe('DirectTransport', () => {
  it('returns the specialist reply on the request correlation id', async () => {
    const transport = new DirectTransport({
      customer_data: scripted((e) => replyTo(e, { success: true, marker: 'direct' })),
      support: idleSupport,
    });
    const reply = await transport.send('customer_data', dataRequest('q-direct'));
    expect(reply).toMatchObject({
      from: 'customer_data',
      to: 'router',
      type: 'response',
      query_id: 'q-direct',
      content: { success: true, marker: 'direct' },
    });
  });

  it('refuses a reply carrying another correlation id', async () => {
    const transport = new DirectTransport({
      customer_data: scripted(() =>
        createEnvelope({ from: 'customer_data', to: 'router', type: 'response', content: {}, queryId: 'q-other' }),
      ),
      support: idleSupport,
    });
    await expect(transport.send('customer_data', dataRequest('q-mine'))).rejects.toThrow(
      new AgentProtocolError('Reply from customer_data carries query_id q-other, expected q-mine'),
    );
  });
});

describe('readReplyEnvelope', () => {
  it('names the sender of a malformed envelope', () => {
    expect(() => readReplyEnvelope({ from: 'mallory' }, dataRequest('q-1'), 'support')).toThrow(AgentProtocolError);
    expect(() => readReplyEnvelope('nope', dataRequest('q-1'), 'support')).toThrow(/^Malformed envelope from support: /);
  });
});

describe('HttpTransport', () => {
  let desk: Desk;

  beforeAll(async () => {
    desk = await buildDesk('http');
  });

  afterAll(async () => {
    await desk.close();
  });

  it('carries the same reply as the in-process path', async () => {
    const direct = new DirectTransport(desk.agents);
    const viaDirect = await direct.send('customer_data', dataRequest('q-same'));
    const viaHttp = await desk.dispatcher.processQuery('Get customer information for ID 2', 'q-same');

    expect(viaDirect.content).toMatchObject({ success: true, customer: { id: 2, name: 'Bob Smith' } });
    expect(viaHttp.customer_info).toEqual(viaDirect.content.customer);
  });

  it('maps a network failure to AgentTransportError', async () => {
    const transport = new HttpTransport({
      urls: { customer_data: 'http://nowhere.test', support: 'http://nowhere.test' },
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(transport.send('customer_data', dataRequest('q-net'))).rejects.toThrow(
      new AgentTransportError('Request to customer_data agent failed: fetch failed'),
    );
  });

  it('maps a timeout to AgentTransportError', async () => {
    const transport = new HttpTransport({
      urls: { customer_data: 'http://slow.test', support: 'http://slow.test' },
      timeoutMs: 5,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted due to timeout')));
        }),
    });
    await expect(transport.send('support', dataRequest('q-slow'))).rejects.toBeInstanceOf(AgentTransportError);
  });

  it('reports a non-2xx answer with its status and body', async () => {
    const transport = new HttpTransport({
      urls: { customer_data: 'http://data.test/', support: 'http://support.test' },
      fetch: async () => new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }),
    });
    await expect(transport.send('customer_data', dataRequest('q-503'))).rejects.toThrow(
      new AgentTransportError('customer_data agent answered 503 Service Unavailable - overloaded'),
    );
  });

  it('rejects a body that is not JSON', async () => {
    const transport = new HttpTransport({
      urls: { customer_data: 'http://data.test', support: 'http://support.test' },
      fetch: async () => new Response('<html></html>', { status: 200 }),
    });
    await expect(transport.send('customer_data', dataRequest('q-html'))).rejects.toThrow(
      new AgentTransportError('customer_data agent sent a body that is not JSON'),
    );
  });

  it('posts the envelope to the recipient process endpoint', async () => {
    const seen: string[] = [];
    const transport = new HttpTransport({
      urls: { customer_data: 'http://data.test/', support: 'http://support.test' },
      fetch: async (input, init) => {
        seen.push(String(input));
        const sent = JSON.parse(String(init?.body));
        return Response.json({ ...sent, from: 'support', to: 'router', type: 'response', content: { ok: 1 } });
      },
    });
    const reply = await transport.send('support', dataRequest('q-path'));
    expect(seen).toEqual(['http://support.test/process']);
    expect(reply.content).toEqual({ ok: 1 });
  });
});

describe('createTransport', () => {
  it('picks the in-process strategy unless HTTP is enabled', () => {
    const agents = { customer_data: scripted((e) => replyTo(e, {})), support: idleSupport };
    expect(createTransport(A2A, { agents }).kind).toBe('direct');
    expect(createTransport({ ...A2A, useHttp: true }, {}).kind).toBe('http');
  });

  it('needs the agents for the in-process strategy', () => {
    expect(() => createTransport(A2A, {})).toThrow('In-process transport needs the specialist agents');
  });
});
