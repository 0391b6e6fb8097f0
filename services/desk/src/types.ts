import { z } from 'zod';

export const customerStatusSchema = z.enum(['active', 'disabled']);
export const ticketStatusSchema = z.enum(['open', 'in_progress', 'resolved']);
export const ticketPrioritySchema = z.enum(['low', 'medium', 'high']);

export type CustomerStatus = z.infer<typeof customerStatusSchema>;
export type TicketStatus = z.infer<typeof ticketStatusSchema>;
export type TicketPriority = z.infer<typeof ticketPrioritySchema>;

export type CustomerId = number;
export type TicketId = number;

// Persisted shapes keep the snake_case field names of the store and the wire.
export const customerSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  status: customerStatusSchema,
  created_at: z.string(),
  updated_at: z.string(),
});

export const ticketSchema = z.object({
  id: z.number().int(),
  customer_id: z.number().int(),
  issue: z.string(),
  status: ticketStatusSchema,
  priority: ticketPrioritySchema,
  created_at: z.string(),
});

export const customerPatchSchema = z.object({
  name: z.string().min(1).optional(),
  email: z.string().optional(),
  phone: z.string().optional(),
  status: customerStatusSchema.optional(),
});

export type Customer = z.infer<typeof customerSchema>;
export type Ticket = z.infer<typeof ticketSchema>;
export type CustomerPatch = z.infer<typeof customerPatchSchema>;

/** Receipt returned when a ticket is opened. */
export const ticketReceiptSchema = z.object({
  ticket_id: z.number().int(),
  customer_id: z.number().int(),
  issue: z.string(),
  status: ticketStatusSchema,
  priority: ticketPrioritySchema,
});

export type TicketReceipt = z.infer<typeof ticketReceiptSchema>;
