import { describe, it, expect } from 'vitest';
import { AI_RATE_LIMITS, getRateLimitConfig } from '../rateLimit';

describe('getRateLimitConfig', () => {
  it('wraps a named limit as Fastify route config', () => {
    expect(getRateLimitConfig('checkConsistency')).toEqual({
      config: { rateLimit: { max: 10, timeWindow: '1 hour' } },
    });
    expect(getRateLimitConfig('kbUpload')).toEqual({
      config: { rateLimit: { max: 60, timeWindow: '1 hour' } },
    });
  });

  it('defines a limit only for routes that use one', () => {
    expect(Object.keys(AI_RATE_LIMITS)).toEqual(['checkConsistency', 'kbUpload']);
  });
});
