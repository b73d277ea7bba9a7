import type { Clock } from './util/clock.js';

export type CacheStatus = 'success' | 'failed_retryable_exhausted' | 'failed_permanent' | 'skipped';

export type ResumeMode = 'disabled' | 'continue' | 'clear';

export type ExitReason = 'completed' | 'budget_reached' | 'error_threshold' | 'cancelled';

export interface URLTask {
  url: string;
  depth: number;
  domain: string;
  retryCount: number;
  discoveredAt: number;
  /** Earliest epoch ms at which a retried task may be dispatched again. */
  notBefore?: number;
}

export interface DomainState {
  domain: string;
  lastRequestTime: number | null;
  currentDelayMs: number;
  cooldownUntil: number;
  consecutiveErrors: number;
  skipped: boolean;
}

export interface CacheEntry {
  status: CacheStatus;
  timestamp: number;
}

export type CacheRecord = Record<string, CacheEntry>;

export interface FrontierEntry {
  url: string;
  depth: number;
  retryCount: number;
}

export interface CheckpointState {
  version: 1;
  frontier: FrontierEntry[];
  cacheRef: string;
  processedCount: number;
  configFingerprint: string;
  domains: DomainState[];
  createdAt: string;
  /** Cache contents, carried only while the cache file itself cannot be written. */
  cache?: CacheRecord;
}

export interface FetchRequest {
  url: string;
  depth: number;
  timeoutMs: number;
  signal: AbortSignal;
}

export interface FetchResult {
  /** Final URL after redirects. */
  url: string;
  status: number | null;
  content?: string;
  contentType?: string;
  links: string[];
  error?: Error;
}

export interface FetchService {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

export interface PageResult {
  url: string;
  depth: number;
  status: number | null;
  content?: string;
  contentType?: string;
  links: string[];
}

export interface FailureEvent {
  url: string;
  depth: number;
  reason: string;
  attempt: number;
  outcome: 'retrying' | 'rate_limited' | CacheStatus;
  resolvedOnRetry: boolean;
}

export interface CrawlSummary {
  exitReason: ExitReason;
  resumed: boolean;
  processedCount: number;
  fetchAttempts: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesSkipped: number;
  uniqueUrlsDiscovered: number;
  pendingUrls: number;
  maxDepth: number;
  totalLinksExtracted: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  durationMs: number;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  duplicatesFiltered: number;
  retryAttempts: number;
  retrySuccesses: number;
  rateLimitHits: number;
  skippedDomains: string[];
  /** Cache entries by terminal status, including entries loaded from earlier runs. */
  cacheCounts: Record<CacheStatus, number>;
  failureLog: FailureEvent[];
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface CrawlOptions {
  maxDepth: number;
  /** 0 means unlimited. */
  maxPages: number;
  delayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  rateLimitStatusCodes: readonly number[];
  maxDomainErrors: number;
  maxConsecutiveErrors: number;
  /** 0 disables the global cap. */
  maxRequestsPerMinute: number;
  resume: ResumeMode;
  stateDir: string;
  cacheFile: string;
  checkpointFile: string;
  mergeCacheFile?: string;
  checkpointEveryPages: number;
  /**
   * Elapsed-time trigger, checked whenever a task finishes. A long cooldown or
   * slow fetch with nothing finishing delays the snapshot until the next
   * completion.
   */
  checkpointIntervalMs: number;
  checkpointMandatory: boolean;
  sameHostOnly: boolean;
  quiet: boolean;
  logLevel: LogLevel;
}

export interface CrawlHandlers {
  onPage(result: PageResult): void | Promise<void>;
  onError?(error: Error, context: { url: string; depth: number }): void;
  onComplete?(summary: CrawlSummary): void;
}

export type CrawlOrchestratorOptions = Partial<CrawlOptions>;

export interface CrawlOrchestratorConfig extends CrawlOrchestratorOptions {
  handlers?: CrawlHandlers;
  fetchService?: FetchService;
  signal?: AbortSignal;
  clock?: Clock;
  /** Attach a SIGINT listener that cancels the run. Defaults to true. */
  handleSignals?: boolean;
}
