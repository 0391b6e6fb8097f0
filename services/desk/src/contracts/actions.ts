import { z } from 'zod';
import { AgentProtocolError } from '../errors';
import {
  customerPatchSchema,
  customerSchema,
  customerStatusSchema,
  ticketPrioritySchema,
  ticketReceiptSchema,
  ticketSchema,
} from '../types';

/**
 * Per-action payloads for both specialists. `content.action` selects the
 * variant; everything else in `content` is that action's arguments.
 */

type Parsers<T> = { [K in keyof T]: z.ZodType<T[K], z.ZodTypeDef, unknown> };

const customerId = z.number().int();
const customerIds = z.array(z.number().int());

// ---------- Customer data agent ----------

const dataArgSchemas = {
  get_customer: z.object({ customer_id: customerId }),
  list_customers: z.object({
    status: customerStatusSchema.default('active'),
    limit: z.number().int().positive().default(100),
  }),
  update_customer: z.object({ customer_id: customerId, data: customerPatchSchema.default({}) }),
  get_customer_history: z.object({ customer_id: customerId }),
  // "premium" is every active customer; the store has no tier field
  get_premium_customers: z.object({}),
};

const customerList = z.object({ customers: z.array(customerSchema), count: z.number().int() });

const dataReplySchemas = {
  get_customer: z.object({ customer: customerSchema }),
  list_customers: customerList,
  update_customer: z.object({ customer_id: customerId }),
  get_customer_history: z.object({ history: z.array(ticketSchema), count: z.number().int() }),
  get_premium_customers: customerList,
};

export type DataAction = keyof typeof dataArgSchemas;
export type DataArgs = { [A in DataAction]: z.output<(typeof dataArgSchemas)[A]> };
export type DataArgsInput = { [A in DataAction]: z.input<(typeof dataArgSchemas)[A]> };
export type DataReplies = { [A in DataAction]: z.output<(typeof dataReplySchemas)[A]> };

export const dataArgParsers: Parsers<DataArgs> = dataArgSchemas;
export const dataReplyParsers: Parsers<DataReplies> = dataReplySchemas;

// ---------- Support agent ----------

const supportArgSchemas = {
  handle_support: z.object({
    query: z.string().default(''),
    customer_info: customerSchema.nullable().default(null),
  }),
  create_ticket: z.object({
    customer_id: customerId,
    issue: z.string().min(1),
    priority: ticketPrioritySchema.default('medium'),
  }),
  get_tickets_by_priority: z.object({
    priority: ticketPrioritySchema,
    customer_ids: customerIds.nullable().optional(),
  }),
  check_can_handle: z.object({ query: z.string().default('') }),
  get_open_tickets_for_customers: z.object({ customer_ids: customerIds.default([]) }),
};

const ticketList = z.object({ tickets: z.array(ticketSchema), count: z.number().int() });

export const customerTierSchema = z.enum(['premium', 'standard', '']);
export type CustomerTier = z.infer<typeof customerTierSchema>;

const supportReplySchemas = {
  handle_support: z.object({
    response: z.string(),
    customer_tier: customerTierSchema,
    actions: z.array(z.string()),
    customer_info: customerSchema.nullable(),
  }),
  create_ticket: z.object({ ticket: ticketReceiptSchema }),
  get_tickets_by_priority: ticketList,
  check_can_handle: z.object({ can_handle: z.boolean(), reason: z.string() }),
  get_open_tickets_for_customers: ticketList,
};

export type SupportAction = keyof typeof supportArgSchemas;
export type SupportArgs = { [A in SupportAction]: z.output<(typeof supportArgSchemas)[A]> };
export type SupportArgsInput = { [A in SupportAction]: z.input<(typeof supportArgSchemas)[A]> };
export type SupportReplies = { [A in SupportAction]: z.output<(typeof supportReplySchemas)[A]> };

export const supportArgParsers: Parsers<SupportArgs> = supportArgSchemas;
export const supportReplyParsers: Parsers<SupportReplies> = supportReplySchemas;

export function isDataAction(action: string): action is DataAction {
  return Object.prototype.hasOwnProperty.call(dataArgSchemas, action);
}

export function isSupportAction(action: string): action is SupportAction {
  return Object.prototype.hasOwnProperty.call(supportArgSchemas, action);
}

// ---------- Replies ----------

export type ActionFailure = {
  success: false;
  error: string;
};

export type ActionReply<R extends object> = ({ success: true } & R) | ActionFailure;

const failureSchema = z.object({ success: z.literal(false), error: z.string() });

export function failure(error: string): ActionFailure {
  return { success: false, error };
}

export function succeed<R extends object>(payload: R): { success: true } & R {
  return { success: true, ...payload };
}

/** Validates a reply payload against the action's schema. */
export function decodeReply<R extends object>(
  schema: z.ZodType<R, z.ZodTypeDef, unknown>,
  content: unknown,
  action: string,
): ActionReply<R> {
  const failed = failureSchema.safeParse(content);
  if (failed.success) return failed.data;

  const parsed = schema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AgentProtocolError(`Malformed ${action} reply: ${issues}`);
  }
  return succeed(parsed.data);
}

/** Formats zod issues the way specialists report invalid arguments. */
export function invalidArguments(action: string, error: z.ZodError): ActionFailure {
  const issues = error.issues.map((i) => `${i.path.join('.') || 'content'}: ${i.message}`).join('; ');
  return failure(`Invalid arguments for ${action}: ${issues}`);
}
