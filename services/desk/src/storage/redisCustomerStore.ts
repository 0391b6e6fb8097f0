import type Redis from 'ioredis';
import { getRedis } from '../redis/client';
import type { CustomerStore, SeedFixture, UpdateOutcome } from '../contracts/customerStore';
import { pickPatch } from '../contracts/customerStore';
import { customerSchema, ticketSchema } from '../types';
import type {
  Customer,
  CustomerId,
  CustomerPatch,
  CustomerStatus,
  Ticket,
  TicketId,
  TicketPriority,
  TicketReceipt,
} from '../types';

type Clock = () => Date;

/**
 * Implements `CustomerStore` on Redis hashes plus two kinds of sorted set:
 * one per customer status (scored by id) and one per customer's tickets
 * (scored by creation time).
 */
export class RedisCustomerStore implements CustomerStore {
  constructor(
    private readonly redis: Redis = getRedis(),
    private readonly prefix = 'desk',
    private readonly now: Clock = () => new Date(),
  ) {}

  private customerKey = (id: CustomerId) => `${this.prefix}:customer:${id}`;
  private statusKey = (status: CustomerStatus) => `${this.prefix}:customers:${status}`;
  private ticketKey = (id: TicketId) => `${this.prefix}:ticket:${id}`;
  private historyKey = (id: CustomerId) => `${this.prefix}:customer:${id}:tickets`;
  private ticketSeqKey = () => `${this.prefix}:ticket:seq`;

  async getCustomer(id: CustomerId): Promise<Customer | null> {
    const hash = await this.redis.hgetall(this.customerKey(id));
    if (!hash || Object.keys(hash).length === 0) return null;
    return toCustomer(hash);
  }

  async listCustomers(status: CustomerStatus, limit: number): Promise<Customer[]> {
    if (limit <= 0) return [];
    const ids = await this.redis.zrange(this.statusKey(status), 0, limit - 1);
    const customers = await Promise.all(ids.map((id) => this.getCustomer(Number(id))));
    return customers.filter((c): c is Customer => c !== null);
  }

  async updateCustomer(id: CustomerId, patch: CustomerPatch): Promise<UpdateOutcome> {
    const fields = pickPatch(patch);
    if (Object.keys(fields).length === 0) {
      return { ok: false, error: 'No valid fields to update' };
    }
    const existing = await this.getCustomer(id);
    if (!existing) {
      return { ok: false, error: `Customer ${id} not found` };
    }

    const updated_at = this.now().toISOString();
    const multi = this.redis.multi();
    multi.hset(this.customerKey(id), { ...fields, updated_at });
    if (fields.status && fields.status !== existing.status) {
      multi.zrem(this.statusKey(existing.status), String(id));
      multi.zadd(this.statusKey(fields.status), id, String(id));
    }
    await multi.exec();
    return { ok: true };
  }

  async createTicket(customerId: CustomerId, issue: string, priority: TicketPriority): Promise<TicketReceipt> {
    const ticketId = await this.redis.incr(this.ticketSeqKey());
    await this.writeTicket({
      id: ticketId,
      customer_id: customerId,
      issue,
      status: 'open',
      priority,
      created_at: this.now().toISOString(),
    });
    return { ticket_id: ticketId, customer_id: customerId, issue, status: 'open', priority };
  }

  async getCustomerHistory(customerId: CustomerId): Promise<Ticket[]> {
    const ids = await this.redis.zrange(this.historyKey(customerId), 0, -1);
    const tickets: Ticket[] = [];
    for (const id of ids) {
      const hash = await this.redis.hgetall(this.ticketKey(Number(id)));
      if (hash && Object.keys(hash).length > 0) tickets.push(toTicket(hash));
    }
    // zset ties fall back to lexicographic member order, so settle the order here
    return tickets.sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id - a.id);
  }

  async seed(fixture: SeedFixture): Promise<void> {
    const existing = await this.redis.keys(`${this.prefix}:*`);
    if (existing.length > 0) {
      await this.redis.del(...existing);
    }

    const stamp = this.now().toISOString();
    const multi = this.redis.multi();
    for (const row of fixture.customers) {
      const status = row.status ?? 'active';
      multi.hset(this.customerKey(row.id), {
        id: String(row.id),
        name: row.name,
        email: row.email ?? '',
        phone: row.phone ?? '',
        status,
        created_at: stamp,
        updated_at: stamp,
      });
      multi.zadd(this.statusKey(status), row.id, String(row.id));
    }
    await multi.exec();

    for (const row of fixture.tickets) {
      const ticketId = await this.redis.incr(this.ticketSeqKey());
      await this.writeTicket({
        id: ticketId,
        customer_id: row.customer_id,
        issue: row.issue,
        status: row.status ?? 'open',
        priority: row.priority ?? 'medium',
        created_at: row.created_at ?? stamp,
      });
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async writeTicket(ticket: Ticket): Promise<void> {
    await this.redis
      .multi()
      .hset(this.ticketKey(ticket.id), {
        id: String(ticket.id),
        customer_id: String(ticket.customer_id),
        issue: ticket.issue,
        status: ticket.status,
        priority: ticket.priority,
        created_at: ticket.created_at,
      })
      .zadd(this.historyKey(ticket.customer_id), Date.parse(ticket.created_at), String(ticket.id))
      .exec();
  }
}

function toCustomer(hash: Record<string, string>): Customer {
  return customerSchema.parse({
    id: Number(hash.id),
    name: hash.name,
    email: hash.email || null,
    phone: hash.phone || null,
    status: hash.status,
    created_at: hash.created_at,
    updated_at: hash.updated_at,
  });
}

function toTicket(hash: Record<string, string>): Ticket {
  return ticketSchema.parse({
    id: Number(hash.id),
    customer_id: Number(hash.customer_id),
    issue: hash.issue,
    status: hash.status,
    priority: hash.priority,
    created_at: hash.created_at,
  });
}
