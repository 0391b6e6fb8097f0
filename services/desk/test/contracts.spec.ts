import { describe, expect, it } from 'vitest';
import {
  dataArgParsers,
  decodeReply,
  invalidArguments,
  isDataAction,
  isSupportAction,
  supportReplyParsers,
} from '../src/contracts/actions';
import { createEnvelope, parseEnvelope, replyTo } from '../src/contracts/envelope';
import { AgentProtocolError } from '../src/errors';

describe('Envelope contract', () => {
  it('issues a correlation id and freezes the envelope', () => {
    const envelope = createEnvelope({ from: 'router', to: 'support', type: 'request', content: { action: 'x' } });

    expect(envelope.query_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(Object.isFrozen(envelope)).toBe(true);
    expect(Date.parse(envelope.timestamp)).not.toBeNaN();
  });

  it('answers on the same correlation id with sender and recipient swapped', () => {
    const request = createEnvelope({
      from: 'router',
      to: 'customer_data',
      type: 'request',
      content: {},
      queryId: 'q-42',
    });
    const reply = replyTo(request, { success: true });

    expect(reply).toMatchObject({ from: 'customer_data', to: 'router', type: 'response', query_id: 'q-42' });
  });

  it('parses a wire envelope and rejects unknown participants', () => {
    const parsed = parseEnvelope({
      from: 'support',
      to: 'router',
      type: 'response',
      content: { success: true },
      query_id: 'q-7',
      timestamp: '2024-05-01T12:00:00.000Z',
    });
    expect(parsed.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(() => parseEnvelope({ from: 'billing', to: 'router', type: 'response', content: {} })).toThrow();
  });
});

describe('Action contract', () => {
  it('knows which specialist owns an action', () => {
    expect(isDataAction('get_customer_history')).toBe(true);
    expect(isDataAction('create_ticket')).toBe(false);
    expect(isSupportAction('create_ticket')).toBe(true);
    expect(isSupportAction('toString')).toBe(false);
  });

  it('fills argument defaults', () => {
    expect(dataArgParsers.list_customers.parse({})).toEqual({ status: 'active', limit: 100 });
    expect(dataArgParsers.update_customer.parse({ customer_id: 3 })).toEqual({ customer_id: 3, data: {} });
  });

  it('formats argument issues with their path', () => {
    const parsed = dataArgParsers.get_customer.safeParse({});
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(invalidArguments('get_customer', parsed.error)).toEqual({
      success: false,
      error: 'Invalid arguments for get_customer: customer_id: Required',
    });
  });

  it('passes failures through and validates successes', () => {
    const schema = supportReplyParsers.check_can_handle;

    expect(decodeReply(schema, { success: false, error: 'nope' }, 'check_can_handle')).toEqual({
      success: false,
      error: 'nope',
    });
    expect(decodeReply(schema, { success: true, can_handle: true, reason: 'ok' }, 'check_can_handle')).toEqual({
      success: true,
      can_handle: true,
      reason: 'ok',
    });
  });

  it('raises a protocol error on a malformed reply', () => {
    expect(() => decodeReply(supportReplyParsers.check_can_handle, { success: true }, 'check_can_handle')).toThrow(
      new AgentProtocolError('Malformed check_can_handle reply: can_handle: Required; reason: Required'),
    );
  });
});
