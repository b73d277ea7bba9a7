import { componentLogger } from '../logger.js';
import type { DomainState } from '../types.js';
import { systemClock, type Clock } from '../util/clock.js';

export interface RateLimiterOptions {
  /** Minimum gap between two requests to the same domain. */
  delayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  /** A domain is skipped once its consecutive rate-limit count exceeds this. */
  maxDomainErrors: number;
  /** Requests per minute across all domains; 0 disables the cap. */
  maxRequestsPerMinute: number;
}

export interface OutcomeUpdate {
  state: DomainState;
  /** True only on the call that moved the domain into the skipped state. */
  newlySkipped: boolean;
}

const MIN_BACKOFF_MS = 1_000;
const MINUTE_MS = 60_000;

/**
 * Continuous-refill token bucket. Holds at most `capacity` tokens and
 * regains one every `60s / capacity`.
 */
class TokenBucket {
  private tokens: number;
  private updatedAt: number;
  private readonly intervalMs: number;

  constructor(private readonly capacity: number, now: number) {
    this.tokens = capacity;
    this.updatedAt = now;
    this.intervalMs = MINUTE_MS / capacity;
  }

  waitFor(now: number): number {
    this.refill(now);
    if (this.tokens >= 1) {
      return 0;
    }
    return Math.ceil((1 - this.tokens) * this.intervalMs);
  }

  take(now: number): void {
    this.refill(now);
    this.tokens -= 1;
  }

  private refill(now: number): void {
    const elapsed = Math.max(0, now - this.updatedAt);
    this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.intervalMs);
    this.updatedAt = now;
  }
}

export class RateLimiter {
  private readonly domains = new Map<string, DomainState>();
  private readonly bucket?: TokenBucket;
  private readonly logger = componentLogger('rate-limiter');

  constructor(
    private readonly options: RateLimiterOptions,
    private readonly clock: Clock = systemClock,
  ) {
    if (options.maxRequestsPerMinute > 0) {
      this.bucket = new TokenBucket(options.maxRequestsPerMinute, clock.now());
    }
  }

  /** Milliseconds until `domain` may be contacted again, ignoring the global cap. */
  domainWait(domain: string, now: number = this.clock.now()): number {
    const state = this.stateFor(domain);
    const sinceLast = state.lastRequestTime === null ? Infinity : now - state.lastRequestTime;
    const politeness = Math.max(0, this.options.delayMs - sinceLast);
    const cooldown = Math.max(0, state.cooldownUntil - now);
    return Math.max(politeness, cooldown);
  }

  /**
   * Suspends until both the domain delay and the global cap allow a request,
   * then reserves the slot. The reservation happens synchronously after the
   * last check, so two workers on the same domain cannot both pass.
   * Resolves with the total time waited.
   */
  async acquire(domain: string, signal?: AbortSignal): Promise<number> {
    let waited = 0;

    for (;;) {
      const now = this.clock.now();
      const wait = Math.max(this.domainWait(domain, now), this.bucket?.waitFor(now) ?? 0);

      if (wait <= 0) {
        this.stateFor(domain).lastRequestTime = now;
        this.bucket?.take(now);
        return waited;
      }

      this.logger.trace({ domain, wait }, 'waiting for rate limit');
      await this.clock.sleep(wait, signal);
      waited += wait;
    }
  }

  /**
   * Feeds a request outcome back. A rate-limited response backs the domain off
   * (first by the base delay, then multiplied by the backoff factor, capped at
   * the max delay); anything else resets it.
   */
  recordOutcome(domain: string, rateLimited: boolean): OutcomeUpdate {
    const state = this.stateFor(domain);

    if (!rateLimited) {
      state.currentDelayMs = this.options.delayMs;
      state.consecutiveErrors = 0;
      return { state: { ...state }, newlySkipped: false };
    }

    const now = this.clock.now();
    const initial = Math.min(this.options.maxDelayMs, Math.max(this.options.delayMs, MIN_BACKOFF_MS));
    state.currentDelayMs =
      state.consecutiveErrors === 0
        ? initial
        : Math.min(this.options.maxDelayMs, state.currentDelayMs * this.options.backoffFactor);
    state.cooldownUntil = Math.max(state.cooldownUntil, now + state.currentDelayMs);
    state.consecutiveErrors += 1;

    let newlySkipped = false;
    if (!state.skipped && state.consecutiveErrors > this.options.maxDomainErrors) {
      state.skipped = true;
      newlySkipped = true;
      this.logger.warn(
        { domain, consecutiveErrors: state.consecutiveErrors },
        'domain exceeded rate-limit error budget; skipping remaining work',
      );
    } else {
      this.logger.info(
        { domain, delayMs: state.currentDelayMs, consecutiveErrors: state.consecutiveErrors },
        'rate limited; backing off',
      );
    }

    return { state: { ...state }, newlySkipped };
  }

  isSkipped(domain: string): boolean {
    return this.domains.get(domain)?.skipped ?? false;
  }

  skippedDomains(): string[] {
    return [...this.domains.values()].filter((state) => state.skipped).map((state) => state.domain);
  }

  getState(domain: string): DomainState | undefined {
    const state = this.domains.get(domain);
    return state ? { ...state } : undefined;
  }

  snapshot(): DomainState[] {
    return [...this.domains.values()].map((state) => ({ ...state }));
  }

  restore(states: readonly DomainState[]): void {
    for (const state of states) {
      this.domains.set(state.domain, { ...state });
    }
  }

  private stateFor(domain: string): DomainState {
    let state = this.domains.get(domain);
    if (!state) {
      state = {
        domain,
        lastRequestTime: null,
        currentDelayMs: this.options.delayMs,
        cooldownUntil: 0,
        consecutiveErrors: 0,
        skipped: false,
      };
      this.domains.set(domain, state);
    }
    return state;
  }
}
