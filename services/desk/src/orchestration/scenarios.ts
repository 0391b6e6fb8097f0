import type { ActionReply } from '../contracts/actions';
import { CoordinationError } from '../errors';
import type { Customer, CustomerPatch } from '../types';
import type { IntentDescriptor } from './intent';
import {
  formatOpenTicketReport,
  formatPriorityReport,
  formatProfile,
  formatUpdateReport,
  joinTicketsToCustomers,
} from './reports';
import type { CoordinationResult, CoordinationRun, Coordinator, Protocol, ScenarioFields, ScenarioName } from './types';

const BULK_LIMIT = 1000;
const EMAIL = /(\S+@\S+\.\S+)/;

export function completed(
  run: CoordinationRun,
  scenario: ScenarioName,
  response: string,
  fields: ScenarioFields = {},
): CoordinationResult {
  return {
    query: run.query,
    query_id: run.queryId,
    scenario,
    success: true,
    response,
    ...fields,
    coordination_log: [...run.log],
  };
}

export function failed(run: CoordinationRun, error: string, scenario?: ScenarioName): CoordinationResult {
  return {
    query: run.query,
    query_id: run.queryId,
    scenario,
    success: false,
    error,
    response: `Error: ${error}`,
    coordination_log: [...run.log],
  };
}

/** Unwraps a reply the protocol cannot go on without. */
function required<R extends object>(reply: ActionReply<R>, action: string): { success: true } & R {
  if (!reply.success) throw new CoordinationError(`${action} failed: ${reply.error}`);
  return reply;
}

/** Email-like token, minus sentence punctuation it picked up. */
export function extractEmail(text: string): string | null {
  const match = EMAIL.exec(text);
  return match ? match[1].replace(/[.,;:!?)]+$/, '') : null;
}

async function lookupCustomer(
  c: Coordinator,
  run: CoordinationRun,
  customerId: number,
  say: string,
  hear: string,
): Promise<Customer | null> {
  const reply = await c.askData(run, 'get_customer', { customer_id: customerId }, { say, hear: () => hear });
  return reply.success ? reply.customer : null;
}

export const taskAllocation: Protocol = async (c, run) => {
  const { intent } = run;
  const id = intent.extractedId;

  if (id !== null && !intent.needsSupport && intent.subIntents.includes('get_info')) {
    const reply = await c.askData(
      run,
      'get_customer',
      { customer_id: id },
      { say: `Get customer ${id}`, hear: () => 'Customer data retrieved' },
    );
    if (!reply.success) {
      return failed(run, `Could not retrieve customer information for ID ${id}`, 'Task Allocation');
    }
    return completed(run, 'Task Allocation', formatProfile(reply.customer), { customer_info: reply.customer });
  }

  const customer =
    id === null ? null : await lookupCustomer(c, run, id, `Get customer ${id}`, 'Customer data retrieved');

  if (intent.needsSupport || !customer) {
    const reply = required(
      await c.askSupport(
        run,
        'handle_support',
        { query: run.query, customer_info: customer },
        { peer: 'Support Agent', say: 'Handle support query', hear: () => 'Response generated' },
      ),
      'handle_support',
    );
    return completed(run, 'Task Allocation', reply.response, {
      customer_info: customer,
      customer_tier: reply.customer_tier,
    });
  }

  return completed(run, 'Task Allocation', formatProfile(customer), { customer_info: customer });
};

export const complexJoin: Protocol = async (c, run) => {
  const listed = required(
    await c.askData(
      run,
      'list_customers',
      { status: 'active', limit: BULK_LIMIT },
      { say: 'Get all active customers', hear: (r) => `Found ${r.customers.length} active customers` },
    ),
    'list_customers',
  );

  const open = required(
    await c.askSupport(
      run,
      'get_open_tickets_for_customers',
      { customer_ids: listed.customers.map((customer) => customer.id) },
      { say: 'Get open tickets', hear: (r) => `Found ${r.tickets.length} open tickets` },
    ),
    'get_open_tickets_for_customers',
  );

  const matches = joinTicketsToCustomers(listed.customers, open.tickets);
  return completed(run, 'Complex Query Coordination', formatOpenTicketReport(matches), {
    matches,
    statistics: {
      active_customers: listed.customers.length,
      customers_with_open_tickets: matches.length,
      total_open_tickets: open.tickets.length,
    },
  });
};

export const multiIntentUpdate: Protocol = async (c, run) => {
  const id = run.intent.extractedId;
  if (id === null) return failed(run, 'Customer ID required for updates', 'Multi-Intent Query');

  const actions: string[] = [];
  const email = extractEmail(run.query);
  if (email) {
    const patch: CustomerPatch = { email };
    const reply = await c.askData(
      run,
      'update_customer',
      { customer_id: id, data: patch },
      { say: `Update customer ${id}`, hear: () => 'Update successful' },
    );
    if (reply.success) actions.push(`Updated customer ${id}: ${JSON.stringify(patch)}`);
  }

  const customer = await lookupCustomer(c, run, id, 'Get customer info', 'Customer data retrieved');
  const history = required(
    await c.askData(
      run,
      'get_customer_history',
      { customer_id: id },
      { say: 'Get ticket history', hear: (r) => `Found ${r.history.length} tickets` },
    ),
    'get_customer_history',
  ).history;

  return completed(run, 'Multi-Intent Query', formatUpdateReport(actions, customer, history), {
    customer_info: customer,
    ticket_history: history,
    actions,
  });
};

export const negotiation: Protocol = async (c, run) => {
  const check = await c.askSupport(
    run,
    'check_can_handle',
    { query: run.query },
    { say: 'Can you handle this?', hear: (r) => r.reason },
  );
  const supportCanHandle = check.success && check.can_handle;

  const id = run.intent.extractedId;
  const customer =
    id === null ? null : await lookupCustomer(c, run, id, 'Get customer context', 'Context provided');

  const reply = required(
    await c.askSupport(
      run,
      'handle_support',
      { query: run.query, customer_info: customer },
      { say: 'Generate response with context', hear: () => 'Coordinated response ready' },
    ),
    'handle_support',
  );

  return completed(run, 'Negotiation/Escalation', reply.response, {
    customer_info: customer,
    customer_tier: reply.customer_tier,
    negotiation: { support_can_handle: supportCanHandle, context_provided: customer !== null },
  });
};

export const multiStep: Protocol = async (c, run) => {
  const premium = required(
    await c.askData(
      run,
      'get_premium_customers',
      {},
      { say: 'Get premium customers', hear: (r) => `Found ${r.customers.length} customers` },
    ),
    'get_premium_customers',
  );

  const urgent = required(
    await c.askSupport(
      run,
      'get_tickets_by_priority',
      { priority: 'high', customer_ids: premium.customers.map((customer) => customer.id) },
      { say: 'Get high-priority tickets', hear: (r) => `Found ${r.tickets.length} high-priority tickets` },
    ),
    'get_tickets_by_priority',
  );

  return completed(run, 'Multi-Step Coordination', formatPriorityReport(premium.customers, urgent.tickets), {
    statistics: { customers_found: premium.customers.length, tickets_found: urgent.tickets.length },
  });
};

export interface ScenarioRoute {
  name: string;
  matches: (text: string, intent: IntentDescriptor) => boolean;
  protocol: Protocol;
  /** Re-entering a protocol counts as one more iteration of the run. */
  reentry?: boolean;
}

// Evaluated top to bottom; the first match wins.
export const SCENARIO_ROUTES: readonly ScenarioRoute[] = [
  { name: 'task-allocation', matches: (_, intent) => !intent.isComplex, protocol: taskAllocation },
  {
    name: 'complex-join',
    matches: (text) => text.includes('all active customers') && text.includes('open tickets'),
    protocol: complexJoin,
  },
  {
    name: 'multi-intent-update',
    matches: (text) => text.includes('update') && text.includes('ticket history'),
    protocol: multiIntentUpdate,
  },
  {
    name: 'negotiation',
    matches: (text, intent) => intent.subIntents.includes('billing_issue') || text.includes('cancel'),
    protocol: negotiation,
  },
  {
    name: 'multi-step',
    matches: (_, intent) => intent.isComplex && intent.subIntents.length > 1,
    protocol: multiStep,
  },
  { name: 'fallback', matches: () => true, protocol: taskAllocation, reentry: true },
];

/** `text` is expected lowercased. */
export function selectRoute(text: string, intent: IntentDescriptor): ScenarioRoute {
  const route = SCENARIO_ROUTES.find((r) => r.matches(text, intent));
  if (!route) throw new Error(`No scenario matches: ${text}`);
  return route;
}
