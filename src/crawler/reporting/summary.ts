import type { CacheStatus, CrawlSummary, ExitReason } from '../../types.js';
import type { FailureTracker } from '../state/failures.js';
import type { Frontier } from '../state/frontier.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  frontier: Frontier;
  failures: FailureTracker;
  processedCount: number;
  skippedDomains: string[];
  cacheCounts: Record<CacheStatus, number>;
  exitReason: ExitReason;
  resumed: boolean;
  startTime: number;
  now: number;
}): CrawlSummary {
  const { stats, frontier, failures, startTime, now } = options;

  return {
    exitReason: options.exitReason,
    resumed: options.resumed,
    processedCount: options.processedCount,
    fetchAttempts: stats.fetchAttempts,
    pagesSucceeded: stats.pagesSucceeded,
    pagesFailed: stats.pagesFailed,
    pagesSkipped: stats.pagesSkipped,
    uniqueUrlsDiscovered: frontier.acceptedCount,
    pendingUrls: frontier.size() + frontier.inFlightCount,
    maxDepth: stats.maxDepth,
    totalLinksExtracted: stats.totalLinksExtracted,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    durationMs: now - startTime,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    peakQueueSize: stats.peakQueueSize,
    duplicatesFiltered: stats.duplicatesFiltered,
    retryAttempts: stats.retryAttempts,
    retrySuccesses: stats.retrySuccesses,
    rateLimitHits: stats.rateLimitHits,
    skippedDomains: [...options.skippedDomains].sort(),
    cacheCounts: { ...options.cacheCounts },
    failureLog: failures.list(),
  };
}
