import type {
  Customer,
  CustomerId,
  CustomerPatch,
  CustomerStatus,
  Ticket,
  TicketPriority,
  TicketReceipt,
  TicketStatus,
} from '../types';

/** Seed rows; timestamps default to the time of seeding. */
export interface SeedCustomer {
  id: CustomerId;
  name: string;
  email?: string | null;
  phone?: string | null;
  status?: CustomerStatus;
}

export interface SeedTicket {
  customer_id: CustomerId;
  issue: string;
  status?: TicketStatus;
  priority?: TicketPriority;
  created_at?: string;
}

export interface SeedFixture {
  customers: SeedCustomer[];
  tickets: SeedTicket[];
}

/** Outcome of a patch; `error` is a human-readable reason when nothing was written. */
export type UpdateOutcome = { ok: true } | { ok: false; error: string };

/**
 * Storage backend behind the MCP tool server. Tools never talk to Redis directly;
 * they go through whichever implementation the server was built with.
 */
export interface CustomerStore {
  getCustomer(id: CustomerId): Promise<Customer | null>;
  /** Ordered by id, truncated to `limit`. */
  listCustomers(status: CustomerStatus, limit: number): Promise<Customer[]>;
  updateCustomer(id: CustomerId, patch: CustomerPatch): Promise<UpdateOutcome>;
  createTicket(customerId: CustomerId, issue: string, priority: TicketPriority): Promise<TicketReceipt>;
  /** Newest first. */
  getCustomerHistory(customerId: CustomerId): Promise<Ticket[]>;
  seed(fixture: SeedFixture): Promise<void>;
  close(): Promise<void>;
}

export const UPDATABLE_FIELDS = ['name', 'email', 'phone', 'status'] as const;

/** Keeps only the fields a patch may touch, dropping undefined values. */
export function pickPatch(patch: CustomerPatch): CustomerPatch {
  const picked: CustomerPatch = {};
  for (const field of UPDATABLE_FIELDS) {
    const value = patch[field];
    if (value !== undefined) {
      Object.assign(picked, { [field]: value });
    }
  }
  return picked;
}
