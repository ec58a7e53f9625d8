// Property-based tests for the outbound email rate limiter
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { EmailRateLimiter } from '../src/shared/utils/rate-limiter';

describe('Rate Limiter Properties', () => {
  it('should allow exactly min(attempts, limit) sends within one window', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 30 }), fc.integer({ min: 0, max: 60 }), async (limit, attempts) => {
        const limiter = new EmailRateLimiter({ maxPerWindow: limit, now: () => 0 });

        const decisions = await Promise.all(Array.from({ length: attempts }, () => limiter.checkAndReserve()));
        const allowed = decisions.filter(decision => decision.allowed).length;

        expect(allowed).toBe(Math.min(attempts, limit));
        expect(limiter.getStatus().remaining).toBe(limit - allowed);
      })
    );
  });

  it('should never report a negative remaining count or a retry hint under one minute', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 5 }),
        fc.array(fc.integer({ min: 0, max: 20 * 60 * 1000 }), { minLength: 1, maxLength: 30 }),
        async (limit, gaps) => {
          let now = 0;
          const limiter = new EmailRateLimiter({ maxPerWindow: limit, now: () => now });

          for (const gap of gaps) {
            now += gap;
            const decision = await limiter.checkAndReserve();

            expect(decision.remaining).toBeGreaterThanOrEqual(0);
            if (!decision.allowed) {
              expect(decision.retryAfterMinutes).toBeGreaterThanOrEqual(1);
              expect(decision.retryAfterMinutes).toBeLessThanOrEqual(60);
            }
          }
        }
      )
    );
  });
});
