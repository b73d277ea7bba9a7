import type { Classification } from '../classifyOutcome.js';

export interface CrawlStats {
  fetchAttempts: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesSkipped: number;
  maxDepth: number;
  totalLinksExtracted: number;
  statusCounts: Map<number, number>;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  duplicatesFiltered: number;
  failureReasons: Map<string, number>;
  retryAttempts: number;
  retrySuccesses: number;
  rateLimitHits: number;
}

export function initializeStats(initialQueueSize: number): CrawlStats {
  return {
    fetchAttempts: 0,
    pagesSucceeded: 0,
    pagesFailed: 0,
    pagesSkipped: 0,
    maxDepth: 0,
    totalLinksExtracted: 0,
    statusCounts: new Map<number, number>(),
    actualMaxConcurrency: 0,
    peakQueueSize: initialQueueSize,
    duplicatesFiltered: 0,
    failureReasons: new Map<string, number>(),
    retryAttempts: 0,
    retrySuccesses: 0,
    rateLimitHits: 0,
  };
}

export function recordAttempt(stats: CrawlStats, depth: number, outcome: Classification): void {
  stats.fetchAttempts += 1;
  stats.maxDepth = Math.max(stats.maxDepth, depth);

  if (outcome.kind !== 'success') {
    increment(stats.failureReasons, outcome.reason);
  }

  if (outcome.kind === 'rate_limited') {
    stats.rateLimitHits += 1;
  }

  if (typeof outcome.status === 'number') {
    increment(stats.statusCounts, outcome.status);
  }
}

export function trackQueuePeak(stats: CrawlStats, pending: number): void {
  stats.peakQueueSize = Math.max(stats.peakQueueSize, pending);
}

function increment<K>(map: Map<K, number>, key: K): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}
