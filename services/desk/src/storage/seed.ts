import { z } from 'zod';
import seedData from '../../data/seed.json';
import type { CustomerStore, SeedFixture } from '../contracts/customerStore';
import { customerStatusSchema, ticketPrioritySchema, ticketStatusSchema } from '../types';

const seedFixtureSchema = z.object({
  customers: z.array(
    z.object({
      id: z.number().int().positive(),
      name: z.string().min(1),
      email: z.string().nullable().optional(),
      phone: z.string().nullable().optional(),
      status: customerStatusSchema.optional(),
    }),
  ),
  tickets: z.array(
    z.object({
      customer_id: z.number().int().positive(),
      issue: z.string().min(1),
      status: ticketStatusSchema.optional(),
      priority: ticketPrioritySchema.optional(),
      created_at: z.string().optional(),
    }),
  ),
});

export function parseSeedFixture(raw: unknown): SeedFixture {
  return seedFixtureSchema.parse(raw);
}

/** Replaces the store's contents with the bundled sample data. */
export async function seedStore(store: CustomerStore, fixture: SeedFixture = parseSeedFixture(seedData)) {
  await store.seed(fixture);
  return { customers: fixture.customers.length, tickets: fixture.tickets.length };
}
