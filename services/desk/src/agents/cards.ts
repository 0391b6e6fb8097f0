import type { Participant } from '../contracts/envelope';
import { TOOL_CATALOG } from '../mcp/tools';

export type AgentCapability =
  | 'data_retrieval'
  | 'data_update'
  | 'ticket_management'
  | 'query_routing'
  | 'support_response'
  | 'coordination';

export interface AgentTask {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

/** Identity and advertised tasks of one participant. */
export interface AgentCard {
  agent_id: string;
  participant: Participant;
  name: string;
  description: string;
  version: string;
  capabilities: AgentCapability[];
  tasks: AgentTask[];
  endpoint: string;
}

function objectSchema(properties: Record<string, unknown>, required: string[] = []) {
  return { type: 'object', properties, required };
}

/** Tasks that map one-to-one onto a tool reuse the tool's input schema. */
function toolTask(name: string, description: string): AgentTask {
  const tool = TOOL_CATALOG.find((t) => t.name === name);
  return { name, description, input_schema: tool ? tool.inputSchema : objectSchema({}) };
}

const integerList = { type: 'array', items: { type: 'integer' } };

export const ROUTER_AGENT_CARD: AgentCard = {
  agent_id: 'router_agent',
  participant: 'router',
  name: 'Router Agent',
  description: 'Orchestrator agent that routes queries and coordinates other agents',
  version: '1.0.0',
  capabilities: ['query_routing', 'coordination'],
  tasks: [
    {
      name: 'route_query',
      description: 'Analyze query intent and route to appropriate agents',
      input_schema: objectSchema(
        {
          query: { type: 'string', description: 'Customer query' },
          query_id: { type: 'string', description: 'Unique query identifier' },
        },
        ['query'],
      ),
    },
  ],
  endpoint: '/query',
};

export const CUSTOMER_DATA_AGENT_CARD: AgentCard = {
  agent_id: 'customer_data_agent',
  participant: 'customer_data',
  name: 'Customer Data Agent',
  description: 'Specialist agent for customer data operations via MCP',
  version: '1.0.0',
  capabilities: ['data_retrieval', 'data_update'],
  tasks: [
    toolTask('get_customer', 'Retrieve customer information by ID'),
    toolTask('list_customers', 'List customers filtered by status'),
    toolTask('update_customer', 'Update customer information'),
    toolTask('get_customer_history', 'Get customer ticket history'),
    {
      name: 'get_premium_customers',
      description: 'List premium customers (currently every active customer)',
      input_schema: objectSchema({}),
    },
  ],
  endpoint: '/process',
};

export const SUPPORT_AGENT_CARD: AgentCard = {
  agent_id: 'support_agent',
  participant: 'support',
  name: 'Support Agent',
  description: 'Specialist agent for customer support operations',
  version: '1.0.0',
  capabilities: ['ticket_management', 'support_response'],
  tasks: [
    {
      name: 'handle_support',
      description: 'Handle customer support queries',
      input_schema: objectSchema(
        {
          query: { type: 'string', description: 'Support query' },
          customer_info: { type: 'object', description: 'Customer context' },
        },
        ['query'],
      ),
    },
    toolTask('create_ticket', 'Create a new support ticket'),
    {
      name: 'get_tickets_by_priority',
      description: 'Get tickets filtered by priority',
      input_schema: objectSchema(
        { priority: { type: 'string', enum: ['low', 'medium', 'high'] }, customer_ids: integerList },
        ['priority'],
      ),
    },
    {
      name: 'check_can_handle',
      description: 'Check if agent can handle a query',
      input_schema: objectSchema({ query: { type: 'string' } }, ['query']),
    },
    {
      name: 'get_open_tickets_for_customers',
      description: 'Get open tickets for a set of customers',
      input_schema: objectSchema({ customer_ids: integerList }, ['customer_ids']),
    },
  ],
  endpoint: '/process',
};

const AGENT_REGISTRY: readonly AgentCard[] = [ROUTER_AGENT_CARD, CUSTOMER_DATA_AGENT_CARD, SUPPORT_AGENT_CARD];

export function listAgentCards(): AgentCard[] {
  return [...AGENT_REGISTRY];
}

export function getAgentCard(agentId: string): AgentCard | undefined {
  return AGENT_REGISTRY.find((card) => card.agent_id === agentId);
}

/** First registered agent advertising `taskName`. */
export function findAgentForTask(taskName: string): AgentCard | undefined {
  return AGENT_REGISTRY.find((card) => card.tasks.some((task) => task.name === taskName));
}
