import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { CrawlSummary } from '../src/types.js';
import {
  formatDuration,
  logError,
  renderPage,
  renderTextSummary,
  resetOutputConfig,
  setOutputConfig,
  writePage,
  writeSummary,
} from '../src/util/output.js';

const summary: CrawlSummary = {
  exitReason: 'completed',
  resumed: true,
  processedCount: 3,
  fetchAttempts: 4,
  pagesSucceeded: 1,
  pagesFailed: 1,
  pagesSkipped: 1,
  uniqueUrlsDiscovered: 3,
  pendingUrls: 0,
  maxDepth: 1,
  totalLinksExtracted: 2,
  statusCounts: { '500': 2, '200': 1 },
  failureReasons: { 'HTTP 500': 2, 'HTTP 429': 1 },
  durationMs: 1_500,
  actualMaxConcurrency: 2,
  peakQueueSize: 2,
  duplicatesFiltered: 0,
  retryAttempts: 1,
  retrySuccesses: 0,
  rateLimitHits: 1,
  cacheCounts: { success: 1, failed_retryable_exhausted: 0, failed_permanent: 1, skipped: 1 },
  skippedDomains: ['slow.example.com'],
  failureLog: [],
};

const spyOnStdout = () => vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
const spyOnStderr = () => vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

describe('output', () => {
  let stdoutSpy: ReturnType<typeof spyOnStdout>;
  let stderrSpy: ReturnType<typeof spyOnStderr>;

  beforeEach(() => {
    stdoutSpy = spyOnStdout();
    stderrSpy = spyOnStderr();
  });

  afterEach(() => {
    resetOutputConfig();
    vi.restoreAllMocks();
  });

  it('renders a visited page line', () => {
    expect(renderPage({ url: 'https://example.com/a', depth: 1, status: 200, links: [] })).toBe(
      'VISITED (depth 1) [200]: https://example.com/a\n',
    );
  });

  it('suppresses page lines and failures in quiet mode but still prints the summary', () => {
    setOutputConfig({ quiet: true });

    writePage({ url: 'https://example.com/a', depth: 0, status: 200, links: [] });
    logError('[failure] https://example.com/fail: HTTP 500');
    writeSummary(summary);

    expect(stderrSpy).not.toHaveBeenCalled();
    expect(stdoutSpy).toHaveBeenCalledTimes(1);
    expect(String(stdoutSpy.mock.calls[0]?.[0])).toContain('--- Crawl Summary ---');
  });

  it('writes failures to stderr with a trailing newline', () => {
    logError('[failure] https://example.com/fail: HTTP 500');

    expect(stderrSpy).toHaveBeenCalledWith('[failure] https://example.com/fail: HTTP 500\n');
  });

  it('orders status codes numerically and failure reasons by count', () => {
    const lines = renderTextSummary(summary).split('\n');

    expect(lines).toContain('Exit reason: completed (resumed)');
    expect(lines).toContain('Skipped domains: slow.example.com');
    expect(lines).toContain('Duration: 1.50s (1500 ms)');

    const statusStart = lines.indexOf('Status codes:');
    expect(lines.slice(statusStart + 1, statusStart + 3)).toEqual(['  200: 1', '  500: 2']);

    const reasonStart = lines.indexOf('Failure reasons:');
    expect(lines.slice(reasonStart + 1, reasonStart + 3)).toEqual(['  HTTP 500: 2', '  HTTP 429: 1']);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0ms'],
    [250, '250ms'],
    [12_340, '12.3s'],
    [125_000, '2m 5.0s'],
  ])('formats %d ms as %s', (input, expected) => {
    expect(formatDuration(input)).toBe(expected);
  });
});
