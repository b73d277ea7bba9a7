import { ensureCrawlerError } from '../../errors.js';
import type { FetchRequest, FetchResult, FetchService } from '../../types.js';
import { reportCrawlerError } from '../../util/errorHandler.js';
import { parseLinks } from '../parsing/parseLinks.js';
import { fetchPage } from './fetchPage.js';

export interface HttpFetchServiceOptions {
  userAgent?: string;
  respectNofollow?: boolean;
}

/**
 * Plain HTTP fetcher: one request per call, no retries (the dispatcher owns
 * retry policy). Links are only extracted from HTML responses.
 */
export class HttpFetchService implements FetchService {
  constructor(private readonly options: HttpFetchServiceOptions = {}) {}

  async fetch(request: FetchRequest): Promise<FetchResult> {
    let response: Response;
    try {
      response = await fetchPage(request.url, {
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        userAgent: this.options.userAgent,
      });
    } catch (error) {
      return {
        url: request.url,
        status: null,
        links: [],
        error: ensureCrawlerError(error, { kind: 'fetch', severity: 'recoverable' }),
      };
    }

    const contentType = response.headers.get('content-type') ?? undefined;
    const finalUrl = response.url || request.url;

    if (!response.ok) {
      await response.body?.cancel();
      return { url: finalUrl, status: response.status, contentType, links: [] };
    }

    const isHtml = contentType?.toLowerCase().includes('text/html') ?? false;
    const content = await response.text();

    if (!isHtml) {
      return { url: finalUrl, status: response.status, contentType, content, links: [] };
    }

    let links: string[] = [];
    try {
      links = parseLinks(content, finalUrl, { respectNofollow: this.options.respectNofollow });
    } catch (error) {
      reportCrawlerError(error, { stage: 'parse', url: finalUrl }, { throwOnFatal: false });
    }

    return { url: finalUrl, status: response.status, contentType, content, links };
  }
}
