import {
  dataArgParsers,
  failure,
  invalidArguments,
  isDataAction,
  succeed,
} from '../contracts/actions';
import type { ActionReply, DataAction, DataArgs, DataReplies } from '../contracts/actions';
import type { AgentEnvelope, EnvelopeContent } from '../contracts/envelope';
import { logger as rootLogger } from '../logger';
import type { Logger } from '../logger';
import type { McpClient } from '../mcp/client';
import { CUSTOMER_DATA_AGENT_CARD } from './cards';
import { actionOf, answer, connectMcp } from './specialist';
import type { Specialist } from './specialist';

const PREMIUM_LIMIT = 1000;

type DataHandlers = {
  [A in DataAction]: (args: DataArgs[A]) => Promise<ActionReply<DataReplies[A]>>;
};

/** Reads and patches customer records through the tool server. */
export class CustomerDataAgent implements Specialist {
  readonly kind = 'customer_data';
  readonly card = CUSTOMER_DATA_AGENT_CARD;
  private readonly log: Logger;
  private readonly handlers: DataHandlers;

  constructor(
    private readonly mcp: McpClient,
    options: { logger?: Logger } = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'customer-data-agent' });
    this.handlers = {
      get_customer: async ({ customer_id }) => {
        const customer = await this.mcp.getCustomer(customer_id);
        return customer ? succeed({ customer }) : failure(`Customer ${customer_id} not found`);
      },
      list_customers: async ({ status, limit }) => {
        const customers = await this.mcp.listCustomers(status, limit);
        return succeed({ customers, count: customers.length });
      },
      update_customer: async ({ customer_id, data }) => {
        await this.mcp.updateCustomer(customer_id, data);
        return succeed({ customer_id });
      },
      get_customer_history: async ({ customer_id }) => {
        const history = await this.mcp.getCustomerHistory(customer_id);
        return succeed({ history, count: history.length });
      },
      // no tier field in the store, so every active customer counts
      get_premium_customers: async () => {
        const customers = await this.mcp.listCustomers('active', PREMIUM_LIMIT);
        return succeed({ customers, count: customers.length });
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
    if (!isDataAction(action)) return failure(`Unknown action: ${action}`);
    return this.run(action, content);
  }

  private async run<A extends DataAction>(action: A, content: EnvelopeContent): Promise<ActionReply<DataReplies[A]>> {
    const parsed = dataArgParsers[action].safeParse(content);
    if (!parsed.success) return invalidArguments(action, parsed.error);
    return this.handlers[action](parsed.data);
  }
}
