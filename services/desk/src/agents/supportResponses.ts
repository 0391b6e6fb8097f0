import type { CustomerTier } from '../contracts/actions';
import type { Customer } from '../types';

interface CannedReply {
  keywords: string[];
  text: string;
  action?: string;
}

// first match wins
const CANNED_REPLIES: CannedReply[] = [
  {
    keywords: ['upgrade', 'premium'],
    text: 'I can help you upgrade your account! Our premium tier includes priority support, advanced features, and exclusive benefits.',
    action: 'Account upgrade assistance provided',
  },
  {
    keywords: ['cancel'],
    text: "I understand you'd like to cancel your subscription. Before we proceed, let me address any concerns you might have. What's the main reason for cancellation?",
    action: 'Cancellation inquiry handled',
  },
  {
    keywords: ['help', 'support'],
    text: "I'm here to help! What specific issue are you experiencing? I can assist with account management, technical problems, billing questions, and more.",
  },
  {
    keywords: ['billing'],
    text: 'I can help with billing questions. Let me look into your account details to provide accurate information.',
    action: 'Billing inquiry routed',
  },
];

const DEFAULT_REPLY = "I'm here to assist you. How can I help today?";

export type SupportResponse = {
  response: string;
  customer_tier: CustomerTier;
  actions: string[];
  customer_info: Customer | null;
};

export function customerTier(customer: Customer | null, privilegedCustomerId: number): CustomerTier {
  if (!customer) return '';
  return customer.id === privilegedCustomerId ? 'premium' : 'standard';
}

export function composeSupportResponse(
  query: string,
  customer: Customer | null,
  privilegedCustomerId: number,
): SupportResponse {
  const text = query.toLowerCase();
  const match = CANNED_REPLIES.find((reply) => reply.keywords.some((word) => text.includes(word)));

  return {
    response: match ? match.text : DEFAULT_REPLY,
    customer_tier: customerTier(customer, privilegedCustomerId),
    actions: match?.action ? [match.action] : [],
    customer_info: customer,
  };
}

/**
 * Whether support can take the query without billing context. The `||` lets
 * everything through except a query naming both refund and billing.
 */
export function canHandle(query: string): { can_handle: boolean; reason: string } {
  const text = query.toLowerCase();
  const can_handle = !text.includes('refund') || !text.includes('billing');
  return { can_handle, reason: can_handle ? 'I can handle this' : 'May need billing context' };
}
