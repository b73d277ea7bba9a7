import { describe, expect, it } from 'vitest';

import { isCancelledError } from '../src/errors.js';
import { RateLimiter, type RateLimiterOptions } from '../src/crawler/rateLimiter.js';
import { FakeClock } from './support/fakes.js';

const defaults: RateLimiterOptions = {
  delayMs: 1_000,
  maxDelayMs: 60_000,
  backoffFactor: 2,
  maxDomainErrors: 5,
  maxRequestsPerMinute: 0,
};

function createLimiter(overrides: Partial<RateLimiterOptions> = {}, clock = new FakeClock()) {
  return { clock, limiter: new RateLimiter({ ...defaults, ...overrides }, clock) };
}

describe('RateLimiter', () => {
  it('lets the first request to a domain through immediately', async () => {
    const { limiter, clock } = createLimiter();

    await expect(limiter.acquire('example.com')).resolves.toBe(0);
    expect(clock.sleeps).toEqual([]);
    expect(limiter.getState('example.com')?.lastRequestTime).toBe(0);
  });

  it('spaces requests to one domain by the base delay', async () => {
    const { limiter, clock } = createLimiter();

    await limiter.acquire('example.com');
    clock.advance(300);
    await expect(limiter.acquire('example.com')).resolves.toBe(700);
    expect(clock.now()).toBe(1_000);
  });

  it('does not delay requests to different domains', async () => {
    const { limiter, clock } = createLimiter();

    await limiter.acquire('a.example.com');
    await limiter.acquire('b.example.com');
    expect(clock.sleeps).toEqual([]);
  });

  it('grows the delay geometrically while rate limited', async () => {
    const { limiter } = createLimiter({ delayMs: 2_000 });
    const waits: number[] = [];

    await limiter.acquire('example.com');
    for (let attempt = 0; attempt < 3; attempt += 1) {
      limiter.recordOutcome('example.com', true);
      waits.push(await limiter.acquire('example.com'));
    }

    expect(waits).toEqual([2_000, 4_000, 8_000]);
  });

  it('starts backoff at one second when the base delay is shorter', () => {
    const { limiter } = createLimiter({ delayMs: 0 });

    expect(limiter.recordOutcome('example.com', true).state.currentDelayMs).toBe(1_000);
    expect(limiter.recordOutcome('example.com', true).state.currentDelayMs).toBe(2_000);
  });

  it('caps the delay and resets it on success', () => {
    const { limiter } = createLimiter({ delayMs: 2_000, maxDelayMs: 5_000 });

    const delays = [1, 2, 3, 4].map(() => limiter.recordOutcome('example.com', true).state.currentDelayMs);
    expect(delays).toEqual([2_000, 4_000, 5_000, 5_000]);

    const { state } = limiter.recordOutcome('example.com', false);
    expect(state.currentDelayMs).toBe(2_000);
    expect(state.consecutiveErrors).toBe(0);
  });

  it('skips a domain once consecutive rate limits exceed the budget', () => {
    const { limiter } = createLimiter({ maxDomainErrors: 2 });

    expect(limiter.recordOutcome('example.com', true).newlySkipped).toBe(false);
    expect(limiter.recordOutcome('example.com', true).newlySkipped).toBe(false);
    expect(limiter.recordOutcome('example.com', true).newlySkipped).toBe(true);
    expect(limiter.recordOutcome('example.com', true).newlySkipped).toBe(false);

    expect(limiter.isSkipped('example.com')).toBe(true);
    expect(limiter.skippedDomains()).toEqual(['example.com']);
  });

  it('holds requests to the global per-minute cap across domains', async () => {
    const { limiter, clock } = createLimiter({ delayMs: 0, maxRequestsPerMinute: 2 });

    await limiter.acquire('a.example.com');
    await limiter.acquire('b.example.com');
    await expect(limiter.acquire('c.example.com')).resolves.toBe(30_000);
    expect(clock.now()).toBe(30_000);
  });

  it('rejects with a cancelled error when the signal aborts', async () => {
    const { limiter } = createLimiter();
    const controller = new AbortController();

    await limiter.acquire('example.com');
    controller.abort();

    const error: unknown = await limiter.acquire('example.com', controller.signal).catch((reason: unknown) => reason);
    expect(isCancelledError(error)).toBe(true);
  });

  it('restores domain state from a snapshot', () => {
    const { limiter, clock } = createLimiter();
    limiter.recordOutcome('example.com', true);

    const restored = new RateLimiter(defaults, clock);
    restored.restore(limiter.snapshot());

    expect(restored.getState('example.com')).toEqual(limiter.getState('example.com'));
    expect(restored.domainWait('example.com')).toBe(1_000);
  });
});
