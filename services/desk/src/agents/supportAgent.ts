import {
  failure,
  invalidArguments,
  isSupportAction,
  succeed,
  supportArgParsers,
} from '../contracts/actions';
import type { ActionReply, SupportAction, SupportArgs, SupportReplies } from '../contracts/actions';
import type { AgentEnvelope, EnvelopeContent } from '../contracts/envelope';
import { config } from '../config';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import type { McpClient } from '../mcp/client';
import type { Ticket } from '../types';
import { SUPPORT_AGENT_CARD } from './cards';
import { actionOf, answer, connectMcp } from './specialist';
import type { Specialist } from './specialist';
import { canHandle, composeSupportResponse } from './supportResponses';

type SupportHandlers = {
  [A in SupportAction]: (args: SupportArgs[A]) => Promise<ActionReply<SupportReplies[A]>>;
};

export interface SupportAgentOptions {
  logger?: Logger;
  /** Customer id that answers as the premium tier. */
  privilegedCustomerId?: number;
}

export class SupportAgent implements Specialist {
  readonly kind = 'support';
  readonly card = SUPPORT_AGENT_CARD;
  private readonly log: Logger;
  private readonly privilegedCustomerId: number;
  private readonly handlers: SupportHandlers;

  constructor(
    private readonly mcp: McpClient,
    options: SupportAgentOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'support-agent' });
    this.privilegedCustomerId = options.privilegedCustomerId ?? config.support.privilegedCustomerId;
    this.handlers = {
      handle_support: async ({ query, customer_info }) =>
        succeed(composeSupportResponse(query, customer_info, this.privilegedCustomerId)),
      create_ticket: async ({ customer_id, issue, priority }) => {
        const ticket = await this.mcp.createTicket(customer_id, issue, priority);
        return succeed({ ticket });
      },
      get_tickets_by_priority: async ({ priority, customer_ids }) => {
        const tickets = await this.mcp.getTicketsByPriority(priority, customer_ids ?? undefined);
        return succeed({ tickets, count: tickets.length });
      },
      check_can_handle: async ({ query }) => succeed(canHandle(query)),
      get_open_tickets_for_customers: async ({ customer_ids }) => {
        const tickets: Ticket[] = [];
        for (const id of customer_ids) {
          const history = await this.mcp.getCustomerHistory(id);
          tickets.push(...history.filter((t) => t.status === 'open'));
        }
        return succeed({ tickets, count: tickets.length });
      },
    };
  }

  initialize(): Promise<void> {
    return connectMcp(this.mcp, this.log);
  }

  handle(envelope: AgentEnvelope): Promise<AgentEnvelope> {
    return answer(envelope, this.log, (content) => this.process(content));
  }

  private async process(content: EnvelopeContent): Promise<EnvelopeContent> {
    const action = actionOf(content);
    if (!isSupportAction(action)) return failure(`Unknown action: ${action}`);
    return this.run(action, content);
  }

  private async run<A extends SupportAction>(
    action: A,
    content: EnvelopeContent,
  ): Promise<ActionReply<SupportReplies[A]>> {
    const parsed = supportArgParsers[action].safeParse(content);
    if (!parsed.success) return invalidArguments(action, parsed.error);
    return this.handlers[action](parsed.data);
  }
}
