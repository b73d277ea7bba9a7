import { createFetchError } from '../../errors.js';
import { extractErrorCode } from '../classifyOutcome.js';

export interface FetchPageOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  userAgent?: string;
}

export const DEFAULT_USER_AGENT = 'crawl-orchestrator/0.1 (+polite; respects per-domain delays)';

export async function fetchPage(url: string, options: FetchPageOptions): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const onOuterAbort = (): void => controller.abort();
  options.signal?.addEventListener('abort', onOuterAbort, { once: true });

  try {
    return await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': options.userAgent ?? DEFAULT_USER_AGENT,
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
        'accept-encoding': 'gzip, deflate, br',
      },
    });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted && err.name === 'AbortError';
    const code = timedOut ? 'ETIMEDOUT' : extractErrorCode(err);
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : err.message || 'Request failed';

    throw createFetchError(
      message,
      {
        url,
        timeoutMs: options.timeoutMs,
        ...(typeof code === 'string' ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onOuterAbort);
  }
}
