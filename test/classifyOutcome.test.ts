import { describe, expect, it } from 'vitest';

import { classifyOutcome, extractErrorCode } from '../src/crawler/classifyOutcome.js';
import { createFetchError } from '../src/errors.js';
import type { FetchResult } from '../src/types.js';

const policy = { rateLimitStatusCodes: [429, 503] };

function withStatus(status: number | null): FetchResult {
  return { url: 'https://example.com/', status, links: [] };
}

function withError(error: Error): FetchResult {
  return { url: 'https://example.com/', status: null, links: [], error };
}

describe('classifyOutcome', () => {
  it.each([
    [200, 'success'],
    [301, 'success'],
    [429, 'rate_limited'],
    [503, 'rate_limited'],
    [500, 'transient'],
    [502, 'transient'],
    [408, 'transient'],
    [404, 'permanent'],
    [403, 'permanent'],
    [410, 'permanent'],
  ])('classifies HTTP %d as %s', (status, kind) => {
    expect(classifyOutcome(withStatus(status), policy)).toEqual({ kind, reason: `HTTP ${status}`, status });
  });

  it('uses the configured rate-limit codes', () => {
    expect(classifyOutcome(withStatus(503), { rateLimitStatusCodes: [429] }).kind).toBe('transient');
    expect(classifyOutcome(withStatus(418), { rateLimitStatusCodes: [418] }).kind).toBe('rate_limited');
  });

  it('treats a missing response as transient', () => {
    expect(classifyOutcome(withStatus(null), policy)).toEqual({ kind: 'transient', reason: 'No response', status: null });
  });

  it('retries timeouts and connection resets', () => {
    const timeout = createFetchError('Request timed out after 50ms', { code: 'ETIMEDOUT' });
    const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    expect(classifyOutcome(withError(timeout), policy)).toEqual({
      kind: 'transient',
      reason: 'ETIMEDOUT: Request timed out after 50ms',
      status: null,
    });
    expect(classifyOutcome(withError(reset), policy).kind).toBe('transient');
  });

  it('does not retry DNS failures or invalid URLs', () => {
    const dns = createFetchError('fetch failed', {}, { cause: Object.assign(new Error('getaddrinfo'), { code: 'ENOTFOUND' }) });

    expect(classifyOutcome(withError(dns), policy)).toEqual({
      kind: 'permanent',
      reason: 'ENOTFOUND: fetch failed',
      status: null,
    });
    expect(classifyOutcome(withError(new TypeError('Invalid URL')), policy)).toEqual({
      kind: 'permanent',
      reason: 'Invalid URL',
      status: null,
    });
  });
});

describe('extractErrorCode', () => {
  it('prefers the code recorded in crawler error details', () => {
    const error = createFetchError('boom', { code: 'ETIMEDOUT' }, { cause: Object.assign(new Error('x'), { code: 'ECONNRESET' }) });
    expect(extractErrorCode(error)).toBe('ETIMEDOUT');
  });

  it('returns undefined when no code is present', () => {
    expect(extractErrorCode(new Error('plain'))).toBeUndefined();
  });
});
