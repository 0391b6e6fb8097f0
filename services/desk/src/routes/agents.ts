import type { FastifyInstance } from 'fastify';
import { envelopeSchema, parseEnvelope } from '../contracts/envelope';
import type { Specialist } from '../agents/specialist';

// ---------- Routes ----------
export async function registerAgentRoutes(app: FastifyInstance, agent: Specialist) {
  // Envelope in, response envelope out. Action failures travel inside the reply.
  app.post('/process', async (req, reply) => {
    const parsed = envelopeSchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const envelope = parseEnvelope(parsed.data);
    if (envelope.to !== agent.kind) {
      return reply.code(400).send({ error: `Envelope addressed to ${envelope.to}, this is ${agent.kind}` });
    }
    return reply.send(await agent.handle(envelope));
  });

  app.get('/agent-card', async () => agent.card);
}
