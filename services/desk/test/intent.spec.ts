import { describe, expect, it } from 'vitest';
import { analyzeIntent, extractCustomerId } from '../src/orchestration/intent';

describe('extractCustomerId', () => {
  it('prefers a labelled id over earlier numbers', () => {
    expect(extractCustomerId('Order 77 was for customer 42')).toBe(42);
    expect(extractCustomerId('Get customer information for ID 5')).toBe(5);
  });

  it('falls back to the first standalone number', () => {
    expect(extractCustomerId('What about 12345?')).toBe(12345);
    expect(extractCustomerId('no digits here')).toBeNull();
  });
});

describe('analyzeIntent', () => {
  it('classifies a plain profile lookup as simple', () => {
    expect(analyzeIntent('Get customer information for ID 5')).toEqual({
      needsData: true,
      needsSupport: false,
      isComplex: false,
      extractedId: 5,
      subIntents: ['get_info'],
    });
  });

  it('marks billing and cancellation as complex support', () => {
    const intent = analyzeIntent("I want to cancel my subscription but I'm having billing issues");
    expect(intent.subIntents).toEqual(['support', 'billing_issue']);
    expect(intent.needsSupport).toBe(true);
    expect(intent.isComplex).toBe(true);
    expect(intent.extractedId).toBeNull();
  });

  it('treats bulk vocabulary as complex without adding a tag', () => {
    const intent = analyzeIntent('Show me customer 3');
    expect(intent.subIntents).toEqual(['get_info']);
    expect(intent.isComplex).toBe(true);
  });

  it('is complex whenever more than one sub-intent is detected', () => {
    const intent = analyzeIntent('Update my email and view my ticket history');
    expect(intent.subIntents).toEqual(['support', 'ticket_query', 'update']);
    expect(intent.isComplex).toBe(true);
    expect(intent.needsData).toBe(true);
  });

  it('yields an all-false descriptor when nothing matches', () => {
    expect(analyzeIntent('good morning')).toEqual({
      needsData: false,
      needsSupport: false,
      isComplex: false,
      extractedId: null,
      subIntents: [],
    });
  });
});
