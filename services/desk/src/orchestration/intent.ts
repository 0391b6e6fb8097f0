export type IntentTag = 'get_info' | 'support' | 'billing_issue' | 'ticket_query' | 'update';

export interface IntentDescriptor {
  needsData: boolean;
  needsSupport: boolean;
  isComplex: boolean;
  extractedId: number | null;
  /** Detection order, no duplicates. */
  subIntents: IntentTag[];
}

interface VocabularyRule {
  tag?: IntentTag;
  words: readonly string[];
  data?: boolean;
  support?: boolean;
  complex?: boolean;
}

// Words are matched as substrings of the lowercased text, so "id" also hits "provide".
const VOCABULARY: readonly VocabularyRule[] = [
  { tag: 'get_info', words: ['customer', 'account', 'info', 'information', 'id'], data: true },
  { tag: 'support', words: ['help', 'support', 'issue', 'problem', 'ticket'], support: true },
  { tag: 'billing_issue', words: ['cancel', 'billing', 'refund', 'charge'], support: true, complex: true },
  {
    tag: 'ticket_query',
    words: ['status', 'tickets', 'history', 'premium', 'open tickets'],
    data: true,
    support: true,
  },
  { tag: 'update', words: ['update', 'change', 'modify'], data: true },
  // bulk requests
  { words: ['show', 'list', 'all', 'every'], complex: true },
];

const LABELLED_ID = /(?:id|customer)\s+(\d+)/;
const ANY_NUMBER = /\b(\d+)\b/;

export function extractCustomerId(text: string): number | null {
  const match = LABELLED_ID.exec(text.toLowerCase()) ?? ANY_NUMBER.exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}

/** Rule-based classification; no match at all yields an all-false descriptor. */
export function analyzeIntent(text: string): IntentDescriptor {
  const lowered = text.toLowerCase();
  const extractedId = extractCustomerId(text);
  const intent: IntentDescriptor = {
    needsData: extractedId !== null,
    needsSupport: false,
    isComplex: false,
    extractedId,
    subIntents: [],
  };

  for (const rule of VOCABULARY) {
    if (!rule.words.some((word) => lowered.includes(word))) continue;
    if (rule.tag) intent.subIntents.push(rule.tag);
    if (rule.data) intent.needsData = true;
    if (rule.support) intent.needsSupport = true;
    if (rule.complex) intent.isComplex = true;
  }

  if (intent.subIntents.length > 1) intent.isComplex = true;
  return intent;
}
