import { isCrawlerError, type CrawlerError } from '../errors.js';
import type { FetchResult } from '../types.js';

export type OutcomeKind = 'success' | 'transient' | 'rate_limited' | 'permanent';

export interface Classification {
  kind: OutcomeKind;
  reason: string;
  status: number | null;
}

export interface ClassifierPolicy {
  rateLimitStatusCodes: readonly number[];
}

const PERMANENT_ERROR_CODES = new Set(['ERR_INVALID_URL', 'ENOTFOUND', 'DISALLOWED', 'ERR_UNSUPPORTED_PROTOCOL']);

const TRANSIENT_STATUS_CODES = new Set([408, 425]);

export function classifyOutcome(result: FetchResult, policy: ClassifierPolicy): Classification {
  const { status } = result;

  if (result.error) {
    return classifyError(result.error, status);
  }

  if (status === null) {
    return { kind: 'transient', reason: 'No response', status };
  }

  if (policy.rateLimitStatusCodes.includes(status)) {
    return { kind: 'rate_limited', reason: `HTTP ${status}`, status };
  }

  if (status >= 200 && status < 400) {
    return { kind: 'success', reason: `HTTP ${status}`, status };
  }

  if (TRANSIENT_STATUS_CODES.has(status) || status >= 500) {
    return { kind: 'transient', reason: `HTTP ${status}`, status };
  }

  return { kind: 'permanent', reason: `HTTP ${status}`, status };
}

function classifyError(error: Error, status: number | null): Classification {
  const code = extractErrorCode(error);
  const reason = code ? `${code}: ${error.message}` : error.message || 'Request failed';

  if (code && PERMANENT_ERROR_CODES.has(code)) {
    return { kind: 'permanent', reason, status };
  }

  if (error instanceof TypeError && /invalid url/i.test(error.message)) {
    return { kind: 'permanent', reason, status };
  }

  // Timeouts, resets and anything unrecognised are retried; the retry budget bounds them.
  return { kind: 'transient', reason, status };
}

export function extractErrorCode(error: Error | CrawlerError): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const { cause } = error;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
