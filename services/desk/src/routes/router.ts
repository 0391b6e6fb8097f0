import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { listAgentCards } from '../agents/cards';
import { sseEvent } from '../mcp/sse';
import type { CoordinationDispatcher } from '../orchestration/dispatcher';
import type { CoordinationResult } from '../orchestration/types';

// ---------- Schemas ----------
const querySchema = z.object({
  query: z.string().min(1, 'query required'),
  query_id: z.string().min(1).optional(),
});

// ---------- Helpers ----------
/** Progress events in the order a client renders them. */
export function progressEvents(result: CoordinationResult): unknown[] {
  const events: unknown[] = [
    { status: 'processing', message: 'Analyzing query...' },
    { type: 'coordination', log: result.coordination_log },
  ];
  if (result.customer_info) events.push({ type: 'customer_info', data: result.customer_info });
  events.push({ type: 'response', data: result.response ?? '' });
  events.push({ status: 'complete', success: result.success, scenario: result.scenario ?? '' });
  return events;
}

// ---------- Routes ----------
export async function registerRouterRoutes(app: FastifyInstance, dispatcher: CoordinationDispatcher) {
  app.post('/query', async (req, reply) => {
    const parsed = querySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const result = await dispatcher.processQuery(parsed.data.query, parsed.data.query_id);
    return reply
      .header('Content-Type', 'text/event-stream')
      .header('Cache-Control', 'no-cache')
      .send(progressEvents(result).map(sseEvent).join(''));
  });

  app.post('/query/sync', async (req, reply) => {
    const parsed = querySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const { query, query_id } = parsed.data;
    const result = await dispatcher.processQuery(query, query_id);
    return reply.send({ query, result, transport: dispatcher.transportKind });
  });

  app.get('/agents', async () => ({ agents: listAgentCards() }));
}
