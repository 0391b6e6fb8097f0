import { failure } from '../contracts/actions';
import { replyTo } from '../contracts/envelope';
import type { AgentEnvelope, EnvelopeContent, SpecialistKind } from '../contracts/envelope';
import { McpToolError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { McpClient } from '../mcp/client';
import type { AgentCard } from './cards';

/**
 * A participant that performs one action per envelope, keyed by
 * `content.action`. Failures are reported in the reply, never thrown; a
 * tool error carries the tool server's own message.
 */
export interface Specialist {
  readonly kind: SpecialistKind;
  readonly card: AgentCard;
  handle(envelope: AgentEnvelope): Promise<AgentEnvelope>;
  initialize(): Promise<void>;
}

export function actionOf(content: EnvelopeContent): string {
  return typeof content.action === 'string' ? content.action : String(content.action);
}

export async function answer(
  envelope: AgentEnvelope,
  log: Logger,
  process: (content: EnvelopeContent) => Promise<EnvelopeContent>,
): Promise<AgentEnvelope> {
  const action = actionOf(envelope.content);
  log.info({ from: envelope.from, type: envelope.type, action, query_id: envelope.query_id }, 'Received message');

  let content: EnvelopeContent;
  try {
    content = await process(envelope.content);
  } catch (err) {
    log.error({ err, action, query_id: envelope.query_id }, 'Action failed');
    content = failure(err instanceof McpToolError ? err.detail : errorMessage(err));
  }

  log.info({ to: envelope.from, action, success: content.success }, 'Sending response');
  return replyTo(envelope, content);
}

/** Opens the agent's tool session. A server that is not up yet is not fatal. */
export async function connectMcp(mcp: McpClient, log: Logger): Promise<void> {
  try {
    await mcp.initialize();
    log.info('MCP client initialized');
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'MCP initialization failed');
  }
}
