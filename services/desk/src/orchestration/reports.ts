import type { Customer, Ticket } from '../types';
import type { CustomerTickets } from './types';

const orNA = (value: string | null) => value ?? 'N/A';

export function formatProfile(customer: Customer): string {
  return [
    'Customer Information:',
    `  ID: ${customer.id}`,
    `  Name: ${customer.name}`,
    `  Email: ${orNA(customer.email)}`,
    `  Phone: ${orNA(customer.phone)}`,
    `  Status: ${customer.status}`,
  ].join('\n');
}

/** Groups tickets under their customer; tickets of customers not in the list are dropped. */
export function joinTicketsToCustomers(customers: Customer[], tickets: Ticket[]): CustomerTickets[] {
  const byId = new Map(customers.map((c) => [c.id, c]));
  const groups = new Map<number, CustomerTickets>();
  for (const ticket of tickets) {
    const customer = byId.get(ticket.customer_id);
    if (!customer) continue;
    const group = groups.get(customer.id) ?? { customer, tickets: [] };
    group.tickets.push(ticket);
    groups.set(customer.id, group);
  }
  return [...groups.values()];
}

export function formatOpenTicketReport(matches: CustomerTickets[]): string {
  const lines = [`Found ${matches.length} active customer(s) with open tickets:\n`];
  for (const { customer, tickets } of matches) {
    lines.push(`- ${customer.name} (ID: ${customer.id}, Email: ${orNA(customer.email)})`);
    lines.push(`  Open Tickets: ${tickets.length}`);
    for (const t of tickets) {
      lines.push(`    • Ticket #${t.id}: ${t.issue} (Priority: ${t.priority})`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function formatUpdateReport(actions: string[], customer: Customer | null, history: Ticket[]): string {
  const lines: string[] = [];
  if (actions.length > 0) {
    lines.push('Updates completed:');
    for (const action of actions) lines.push(`  ✓ ${action}`);
    lines.push('');
  }

  if (customer) {
    lines.push('Customer Information:');
    lines.push(`  Name: ${customer.name}`);
    lines.push(`  Email: ${orNA(customer.email)}`);
    lines.push(`  Status: ${customer.status}`);
    lines.push('');
  }

  lines.push(`Ticket History (${history.length} tickets):`);
  if (history.length === 0) {
    lines.push('  No tickets found.');
  }
  for (const t of history) {
    lines.push(`  • Ticket #${t.id}: ${t.issue}`);
    lines.push(`    Status: ${t.status}, Priority: ${t.priority}`);
    lines.push(`    Created: ${t.created_at}`);
  }
  return lines.join('\n');
}

export function formatPriorityReport(customers: Customer[], tickets: Ticket[]): string {
  if (tickets.length === 0) return 'No high-priority tickets found for premium customers.';

  const names = new Map(customers.map((c) => [c.id, c.name]));
  const lines = [`Found ${tickets.length} high-priority ticket(s) for premium customers:\n`];
  for (const t of tickets) {
    lines.push(`- Ticket #${t.id}: ${t.issue}`);
    lines.push(`  Customer: ${names.get(t.customer_id) ?? `Customer ${t.customer_id}`} (ID: ${t.customer_id})`);
    lines.push(`  Status: ${t.status}, Priority: ${t.priority}`);
    lines.push('');
  }
  return lines.join('\n');
}
