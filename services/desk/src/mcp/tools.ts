import { z } from 'zod';
import type { CustomerStore } from '../contracts/customerStore';
import { RpcErrorCode } from '../contracts/jsonrpc';
import type { ToolDescriptor } from '../contracts/jsonrpc';
import { errorMessage } from '../errors';
import { customerPatchSchema, customerStatusSchema, ticketPrioritySchema } from '../types';

export type ToolOutcome =
  | { success: true; result: unknown }
  | { success: false; error: string; code?: number };

const customerIdProperty = (description: string) => ({ type: 'integer', description });

export const TOOL_CATALOG: readonly ToolDescriptor[] = [
  {
    name: 'get_customer',
    description: 'Retrieve customer information by customer ID',
    inputSchema: {
      type: 'object',
      properties: { customer_id: customerIdProperty('The customer ID to retrieve') },
      required: ['customer_id'],
    },
  },
  {
    name: 'list_customers',
    description: 'List customers filtered by status with optional limit',
    inputSchema: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: ['active', 'disabled'], description: 'Filter by customer status' },
        limit: { type: 'integer', description: 'Maximum number of customers to return' },
      },
      required: ['status'],
    },
  },
  {
    name: 'update_customer',
    description: 'Update customer information',
    inputSchema: {
      type: 'object',
      properties: {
        customer_id: customerIdProperty('The customer ID to update'),
        data: {
          type: 'object',
          description: 'Customer data fields to update (name, email, phone, status)',
          properties: {
            name: { type: 'string' },
            email: { type: 'string' },
            phone: { type: 'string' },
            status: { type: 'string', enum: ['active', 'disabled'] },
          },
        },
      },
      required: ['customer_id', 'data'],
    },
  },
  {
    name: 'create_ticket',
    description: 'Create a new support ticket',
    inputSchema: {
      type: 'object',
      properties: {
        customer_id: customerIdProperty('The customer ID for this ticket'),
        issue: { type: 'string', description: 'Description of the issue' },
        priority: { type: 'string', enum: ['low', 'medium', 'high'], description: 'Ticket priority level' },
      },
      required: ['customer_id', 'issue', 'priority'],
    },
  },
  {
    name: 'get_customer_history',
    description: 'Get all tickets for a customer',
    inputSchema: {
      type: 'object',
      properties: { customer_id: customerIdProperty('The customer ID to get history for') },
      required: ['customer_id'],
    },
  },
];

const customerIdArgs = z.object({ customer_id: z.number().int() });

const toolArgSchemas = {
  get_customer: customerIdArgs,
  list_customers: z.object({
    status: customerStatusSchema,
    limit: z.number().int().positive().default(100),
  }),
  update_customer: z.object({
    customer_id: z.number().int(),
    // unknown keys are dropped, not rejected
    data: customerPatchSchema,
  }),
  create_ticket: z.object({
    customer_id: z.number().int(),
    issue: z.string().min(1),
    priority: ticketPrioritySchema,
  }),
  get_customer_history: customerIdArgs,
};

type ToolName = keyof typeof toolArgSchemas;
type ToolArgs = { [K in ToolName]: z.infer<(typeof toolArgSchemas)[K]> };
type ToolArgParsers = { [K in ToolName]: z.ZodType<ToolArgs[K], z.ZodTypeDef, unknown> };
type ToolHandlers = { [K in ToolName]: (args: ToolArgs[K]) => Promise<ToolOutcome> };

const toolArgs: ToolArgParsers = toolArgSchemas;

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(toolArgs, name);
}

function handlersFor(store: CustomerStore): ToolHandlers {
  return {
    get_customer: async ({ customer_id }) => {
      const customer = await store.getCustomer(customer_id);
      return customer
        ? { success: true, result: customer }
        : { success: false, error: `Customer ${customer_id} not found`, code: RpcErrorCode.NotFound };
    },
    list_customers: async ({ status, limit }) => ({
      success: true,
      result: await store.listCustomers(status, limit),
    }),
    update_customer: async ({ customer_id, data }) => {
      const outcome = await store.updateCustomer(customer_id, data);
      return outcome.ok
        ? { success: true, result: { message: `Customer ${customer_id} updated` } }
        : { success: false, error: outcome.error };
    },
    create_ticket: async ({ customer_id, issue, priority }) => ({
      success: true,
      result: await store.createTicket(customer_id, issue, priority),
    }),
    get_customer_history: async ({ customer_id }) => ({
      success: true,
      result: await store.getCustomerHistory(customer_id),
    }),
  };
}

async function runTool<K extends ToolName>(handlers: ToolHandlers, name: K, raw: unknown): Promise<ToolOutcome> {
  const parsed = toolArgs[name].safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`);
    return { success: false, error: `Invalid arguments for ${name}: ${issues.join('; ')}` };
  }
  return handlers[name](parsed.data);
}

/**
 * Runs a named tool against the store. Never throws: failures come back as
 * `{ success: false, error }` so the route can map them onto a JSON-RPC error.
 */
export async function executeTool(store: CustomerStore, name: string, args: unknown): Promise<ToolOutcome> {
  if (!isToolName(name)) {
    return { success: false, error: `Unknown tool: ${name}` };
  }
  try {
    return await runTool(handlersFor(store), name, args);
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}
