import { randomUUID } from 'crypto';
import { z } from 'zod';

export const participantSchema = z.enum(['router', 'customer_data', 'support']);
export const messageTypeSchema = z.enum(['query', 'request', 'response', 'escalation', 'coordination']);

export type Participant = z.infer<typeof participantSchema>;
export type MessageType = z.infer<typeof messageTypeSchema>;
export type SpecialistKind = Exclude<Participant, 'router'>;

export type EnvelopeContent = Record<string, unknown>;

/**
 * Unit exchanged between router and specialists, in process or over HTTP.
 * `query_id` ties a request to its reply and to the whole coordination run.
 */
export interface AgentEnvelope<C extends EnvelopeContent = EnvelopeContent> {
  readonly from: Participant;
  readonly to: Participant;
  readonly type: MessageType;
  readonly content: C;
  readonly query_id: string;
  readonly timestamp: string;
}

export const envelopeSchema = z.object({
  from: participantSchema,
  to: participantSchema,
  type: messageTypeSchema,
  content: z.record(z.unknown()),
  query_id: z.string().min(1).optional(),
  timestamp: z.string().optional(),
});

export interface EnvelopeInit<C extends EnvelopeContent> {
  from: Participant;
  to: Participant;
  type: MessageType;
  content: C;
  queryId?: string;
  timestamp?: string;
}

export function newQueryId(): string {
  return randomUUID();
}

/** Builds a frozen envelope, issuing a correlation id when none is given. */
export function createEnvelope<C extends EnvelopeContent>(init: EnvelopeInit<C>): AgentEnvelope<C> {
  return Object.freeze({
    from: init.from,
    to: init.to,
    type: init.type,
    content: init.content,
    query_id: init.queryId || newQueryId(),
    timestamp: init.timestamp ?? new Date().toISOString(),
  });
}

/** Response envelope addressed back to the sender, on the same correlation id. */
export function replyTo<C extends EnvelopeContent>(request: AgentEnvelope, content: C): AgentEnvelope<C> {
  return createEnvelope({
    from: request.to,
    to: request.from,
    type: 'response',
    content,
    queryId: request.query_id,
  });
}

/** Decodes a wire envelope; throws a `ZodError` on shape mismatch. */
export function parseEnvelope(raw: unknown): AgentEnvelope {
  const parsed = envelopeSchema.parse(raw);
  return createEnvelope({
    from: parsed.from,
    to: parsed.to,
    type: parsed.type,
    content: parsed.content,
    queryId: parsed.query_id,
    timestamp: parsed.timestamp,
  });
}
