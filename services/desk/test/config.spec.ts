import { describe, expect, it } from 'vitest';
import { config } from '../src/config';

describe('config', () => {
  it('is frozen down to each section', () => {
    expect(Object.isFrozen(config)).toBe(true);
    for (const section of [config.ports, config.mcp, config.a2a, config.store, config.router, config.support]) {
      expect(Object.isFrozen(section)).toBe(true);
    }
  });

  it('refuses writes at run time', () => {
    const router: { maxIterations: number } = config.router;
    expect(() => {
      router.maxIterations = 99;
    }).toThrow(TypeError);
    expect(config.router.maxIterations).toBe(10);
  });

  it('keeps the fixed protocol settings', () => {
    expect(config.support.privilegedCustomerId).toBe(12345);
    expect(config.a2a.timeoutMs).toBe(30_000);
    expect(config.mcp.maxQueuedMessages).toBe(100);
  });
});
