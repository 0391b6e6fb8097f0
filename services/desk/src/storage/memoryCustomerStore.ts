import type { CustomerStore, SeedFixture, UpdateOutcome } from '../contracts/customerStore';
import { pickPatch } from '../contracts/customerStore';
import type {
  Customer,
  CustomerId,
  CustomerPatch,
  CustomerStatus,
  Ticket,
  TicketPriority,
  TicketReceipt,
} from '../types';

type Clock = () => Date;

/**
 * In-process `CustomerStore`. Used by the `memory` driver and by specs that
 * need a store without Redis.
 */
export class MemoryCustomerStore implements CustomerStore {
  private readonly customers = new Map<CustomerId, Customer>();
  private readonly tickets: Ticket[] = [];
  private nextTicketId = 1;

  constructor(private readonly now: Clock = () => new Date()) {}

  async getCustomer(id: CustomerId) {
    const customer = this.customers.get(id);
    return customer ? { ...customer } : null;
  }

  async listCustomers(status: CustomerStatus, limit: number) {
    return [...this.customers.values()]
      .filter((c) => c.status === status)
      .sort((a, b) => a.id - b.id)
      .slice(0, Math.max(0, limit))
      .map((c) => ({ ...c }));
  }

  async updateCustomer(id: CustomerId, patch: CustomerPatch): Promise<UpdateOutcome> {
    const fields = pickPatch(patch);
    if (Object.keys(fields).length === 0) {
      return { ok: false, error: 'No valid fields to update' };
    }
    const existing = this.customers.get(id);
    if (!existing) {
      return { ok: false, error: `Customer ${id} not found` };
    }
    this.customers.set(id, { ...existing, ...fields, updated_at: this.now().toISOString() });
    return { ok: true };
  }

  async createTicket(customerId: CustomerId, issue: string, priority: TicketPriority): Promise<TicketReceipt> {
    const ticket: Ticket = {
      id: this.nextTicketId++,
      customer_id: customerId,
      issue,
      status: 'open',
      priority,
      created_at: this.now().toISOString(),
    };
    this.tickets.push(ticket);
    return { ticket_id: ticket.id, customer_id: customerId, issue, status: ticket.status, priority };
  }

  async getCustomerHistory(customerId: CustomerId) {
    return this.tickets
      .filter((t) => t.customer_id === customerId)
      .sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id - a.id)
      .map((t) => ({ ...t }));
  }

  async seed(fixture: SeedFixture) {
    const stamp = this.now().toISOString();
    this.customers.clear();
    this.tickets.length = 0;
    this.nextTicketId = 1;

    for (const row of fixture.customers) {
      this.customers.set(row.id, {
        id: row.id,
        name: row.name,
        email: row.email ?? null,
        phone: row.phone ?? null,
        status: row.status ?? 'active',
        created_at: stamp,
        updated_at: stamp,
      });
    }
    for (const row of fixture.tickets) {
      this.tickets.push({
        id: this.nextTicketId++,
        customer_id: row.customer_id,
        issue: row.issue,
        status: row.status ?? 'open',
        priority: row.priority ?? 'medium',
        created_at: row.created_at ?? stamp,
      });
    }
  }

  async close() {}
}
