import pLimit from 'p-limit';

import { computeConfigFingerprint } from '../config/fingerprint.js';
import {
  CrawlerError,
  createFetchError,
  ensureCrawlerError,
  isCancelledError,
} from '../errors.js';
import { componentLogger } from '../logger.js';
import type {
  CacheRecord,
  CacheStatus,
  CheckpointState,
  CrawlHandlers,
  CrawlOptions,
  CrawlSummary,
  ExitReason,
  FetchResult,
  FetchService,
  PageResult,
  URLTask,
} from '../types.js';
import type { Clock } from '../util/clock.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { resetOutputConfig, setOutputConfig } from '../util/output.js';
import { CheckpointManager, type CheckpointPayload } from './checkpoint.js';
import { classifyOutcome, type Classification } from './classifyOutcome.js';
import { RateLimiter } from './rateLimiter.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { DedupCache } from './state/dedupCache.js';
import { FailureTracker } from './state/failures.js';
import { Frontier } from './state/frontier.js';
import { initializeStats, recordAttempt, trackQueuePeak, type CrawlStats } from './state/stats.js';
import { normalizeUrl } from './url/normalizeUrl.js';
import { createScopeFilter } from './url/scope.js';

export interface CrawlRuntimeOptions {
  seeds: readonly string[];
  options: Readonly<CrawlOptions>;
  fetchService: FetchService;
  handlers: CrawlHandlers;
  clock: Clock;
  signal?: AbortSignal;
  handleSignals: boolean;
}

const DOMAIN_SKIPPED_REASON = 'Domain skipped after repeated rate limiting';

/**
 * The fetch dispatcher. A pump hands frontier tasks to a p-limit pool of
 * `concurrency` workers; each worker waits on the rate limiter, fetches,
 * classifies the outcome and feeds cache, rate limiter and frontier. The pump
 * re-runs whenever a worker finishes, so an empty frontier simply leaves the
 * slot idle until another worker discovers links.
 */
export class CrawlerEngine {
  private readonly cache: DedupCache;
  private readonly frontier: Frontier;
  private readonly rateLimiter: RateLimiter;
  private readonly checkpoints: CheckpointManager;
  private readonly failures = new FailureTracker();
  private readonly stats: CrawlStats;
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly active = new Set<Promise<void>>();
  private readonly stopController = new AbortController();
  private readonly inScope: (url: string) => boolean;
  private readonly logger = componentLogger('dispatcher');
  private readonly options: Readonly<CrawlOptions>;
  private readonly clock: Clock;
  private readonly startTime: number;
  private readonly sigintHandler = (): void => {
    this.stop('cancelled');
  };
  private readonly abortHandler = (): void => {
    this.stop('cancelled');
  };
  private sigintAttached = false;
  private checkpointChain: Promise<void> = Promise.resolve();
  private cachePersistenceEnabled = true;
  private processedCount = 0;
  private consecutiveErrors = 0;
  private runningCount = 0;
  private resumed = false;
  private stopReason?: ExitReason;
  private fatalError?: CrawlerError;

  constructor(private readonly runtime: CrawlRuntimeOptions) {
    const { options, clock } = runtime;
    this.options = options;
    this.clock = clock;
    this.startTime = clock.now();
    this.cache = new DedupCache(options.cacheFile, clock);
    this.frontier = new Frontier({ maxDepth: options.maxDepth, maxPages: options.maxPages }, this.cache, clock);
    this.rateLimiter = new RateLimiter(
      {
        delayMs: options.delayMs,
        maxDelayMs: options.maxDelayMs,
        backoffFactor: options.backoffFactor,
        maxDomainErrors: options.maxDomainErrors,
        maxRequestsPerMinute: options.maxRequestsPerMinute,
      },
      clock,
    );
    this.checkpoints = new CheckpointManager(
      {
        filePath: options.checkpointFile,
        configFingerprint: computeConfigFingerprint(options),
        everyPages: options.checkpointEveryPages,
        intervalMs: options.checkpointIntervalMs,
        mandatory: options.checkpointMandatory,
      },
      clock,
    );
    this.stats = initializeStats(0);
    this.limiter = pLimit(options.concurrency);
    this.inScope = createScopeFilter(runtime.seeds, options.sameHostOnly);
  }

  async run(): Promise<CrawlSummary> {
    this.attachSignalHandlers();
    try {
      await this.prepare();
      this.logger.info(
        { seeds: this.runtime.seeds.length, pending: this.frontier.size(), resumed: this.resumed },
        'crawl started',
      );

      this.pump();
      while (this.active.size > 0) {
        await Promise.allSettled([...this.active]);
      }

      if (this.fatalError) {
        throw this.fatalError;
      }

      await this.writeCheckpoint();

      const summary = this.buildSummary();
      this.logger.info(
        { exitReason: summary.exitReason, processed: summary.processedCount, pending: summary.pendingUrls },
        'crawl finished',
      );
      return summary;
    } finally {
      this.detachSignalHandlers();
    }
  }

  private async prepare(): Promise<void> {
    const { resume } = this.options;

    if (resume === 'clear') {
      await this.cache.clear();
      await this.checkpoints.clear();
      this.logger.info({ cacheFile: this.options.cacheFile }, 'cleared cache and checkpoint');
    }

    await this.loadCache();

    if (resume === 'continue') {
      const state = await this.checkpoints.load();
      if (state) {
        await this.restore(state);
      }
    }

    for (const seed of this.runtime.seeds) {
      const result = this.frontier.enqueue(seed, 0);
      if (result !== 'accepted') {
        this.logger.debug({ url: seed, result }, 'seed not enqueued');
      }
    }

    trackQueuePeak(this.stats, this.frontier.size());
    this.checkpoints.reset(this.processedCount);
  }

  private async loadCache(): Promise<void> {
    try {
      await this.cache.load();
    } catch (error) {
      if (this.options.checkpointMandatory) {
        const cacheError = ensureCrawlerError(error, { kind: 'cache' });
        throw new CrawlerError({
          message: cacheError.message,
          kind: 'cache',
          severity: 'fatal',
          details: cacheError.details,
          cause: cacheError.cause,
        });
      }

      reportCrawlerError(error, { stage: 'cache-load' }, { defaultKind: 'cache', throwOnFatal: false });
      this.cachePersistenceEnabled = false;
      this.logger.warn({ cacheFile: this.options.cacheFile }, 'continuing with an in-memory cache only');
    }

    const { mergeCacheFile } = this.options;
    if (mergeCacheFile) {
      try {
        await this.cache.mergeFile(mergeCacheFile);
      } catch (error) {
        // Only the external file is unusable; the main cache keeps persisting.
        reportCrawlerError(
          error,
          { stage: 'cache-merge', path: mergeCacheFile },
          { defaultKind: 'cache', defaultSeverity: 'recoverable', throwOnFatal: false },
        );
      }
    }
  }

  private async restore(state: CheckpointState): Promise<void> {
    if (state.cacheRef && state.cacheRef !== this.cache.path) {
      const referenced = new DedupCache(state.cacheRef, this.clock);
      try {
        await referenced.load();
        this.cache.merge(referenced.snapshot());
      } catch (error) {
        reportCrawlerError(error, { stage: 'checkpoint-restore' }, { defaultKind: 'cache', throwOnFatal: false });
      }
    }

    if (state.cache) {
      this.cache.merge(state.cache);
    }

    this.rateLimiter.restore(state.domains);
    this.processedCount = state.processedCount;
    const restored = this.frontier.restore(state.frontier, state.processedCount);
    this.resumed = true;

    this.logger.info({ restored, processed: state.processedCount }, 'resuming from checkpoint');
  }

  private pump(): void {
    while (!this.stopReason) {
      if (this.runtime.signal?.aborted) {
        this.stop('cancelled');
        break;
      }

      if (this.budgetReached()) {
        this.stop('budget_reached');
        break;
      }

      if (this.active.size >= this.options.concurrency) {
        break;
      }

      const task = this.frontier.dequeue();
      if (!task) {
        break;
      }

      this.schedule(task);
    }
  }

  private schedule(task: URLTask): void {
    const job: Promise<void> = this.limiter(async () => {
      this.runningCount += 1;
      this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.runningCount);
      try {
        await this.handleTask(task);
      } finally {
        this.runningCount -= 1;
      }
    })
      .catch((error: unknown) => {
        this.handleTaskError(task, error);
      })
      .finally(() => {
        this.active.delete(job);
        this.pump();
      });

    this.active.add(job);
  }

  private async handleTask(task: URLTask): Promise<void> {
    if (this.cache.contains(task.url)) {
      this.frontier.complete(task.url);
      return;
    }

    if (this.rateLimiter.isSkipped(task.domain)) {
      this.failures.record(task, DOMAIN_SKIPPED_REASON, 'skipped');
      this.finalize(task, 'skipped');
      return;
    }

    const signal = this.stopController.signal;
    if (task.notBefore !== undefined) {
      await this.clock.sleep(task.notBefore - this.clock.now(), signal);
    }
    await this.rateLimiter.acquire(task.domain, signal);

    // Another worker may have skipped the domain while this one was waiting.
    if (this.rateLimiter.isSkipped(task.domain)) {
      this.failures.record(task, DOMAIN_SKIPPED_REASON, 'skipped');
      this.finalize(task, 'skipped');
      return;
    }

    this.logger.debug({ url: task.url, depth: task.depth, attempt: task.retryCount + 1 }, 'fetching');
    const result = await this.fetchTask(task);
    const outcome = classifyOutcome(result, this.options);
    recordAttempt(this.stats, task.depth, outcome);

    const update = this.rateLimiter.recordOutcome(task.domain, outcome.kind === 'rate_limited');

    switch (outcome.kind) {
      case 'success':
        this.onSuccess(task, result);
        break;
      case 'transient':
        this.onTransientFailure(task, outcome);
        break;
      case 'rate_limited':
        this.onRateLimited(task, outcome, update.newlySkipped);
        break;
      case 'permanent':
        this.failures.record(task, outcome.reason, 'failed_permanent');
        this.finalize(task, 'failed_permanent', outcome.reason);
        break;
    }

    this.trackConsecutiveErrors(outcome.kind === 'success');
    await this.maybeCheckpoint();
  }

  private handleTaskError(task: URLTask, error: unknown): void {
    if (isCancelledError(error)) {
      // Stopped while waiting: the task was never attempted.
      this.frontier.release(task);
      return;
    }

    const crawlerError = ensureCrawlerError(error, {
      kind: 'internal',
      severity: 'fatal',
      details: { url: task.url, depth: task.depth },
    });

    reportCrawlerError(
      crawlerError,
      { stage: 'dispatch', url: task.url, depth: task.depth },
      { throwOnFatal: false },
    );
    this.runtime.handlers.onError?.(crawlerError, { url: task.url, depth: task.depth });

    if (crawlerError.severity === 'fatal') {
      this.fatalError ??= crawlerError;
      this.stop('error_threshold');
    }
  }

  private async fetchTask(task: URLTask): Promise<FetchResult> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<FetchResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          url: task.url,
          status: null,
          links: [],
          error: createFetchError(`Request timed out after ${timeoutMs}ms`, {
            url: task.url,
            code: 'ETIMEDOUT',
          }),
        });
      }, timeoutMs);
    });

    const request = this.runtime.fetchService
      .fetch({ url: task.url, depth: task.depth, timeoutMs, signal: controller.signal })
      .catch(
        (error: unknown): FetchResult => ({
          url: task.url,
          status: null,
          links: [],
          error: error instanceof Error ? error : new Error(String(error)),
        }),
      );

    try {
      return await Promise.race([request, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private onSuccess(task: URLTask, result: FetchResult): void {
    this.finalize(task, 'success');

    if (task.retryCount > 0) {
      this.stats.retrySuccesses += 1;
      this.failures.resolve(task.url);
    }

    const finalUrl = normalizeUrl(result.url) ?? task.url;
    if (finalUrl !== task.url && this.inScope(finalUrl) && !this.cache.contains(finalUrl)) {
      // Redirect target was fetched as part of this request.
      this.cache.mark(finalUrl, 'success');
    }

    const links = this.enqueueLinks(task, result.links, finalUrl);

    this.deliver({
      url: task.url,
      depth: task.depth,
      status: result.status,
      content: result.content,
      contentType: result.contentType,
      links,
    });
  }

  private enqueueLinks(parent: URLTask, rawLinks: readonly string[], base: string): string[] {
    const links = new Set<string>();
    const childDepth = parent.depth + 1;

    for (const raw of rawLinks) {
      const normalized = normalizeUrl(raw, base);
      if (!normalized || !this.inScope(normalized) || links.has(normalized)) {
        continue;
      }

      links.add(normalized);

      if (childDepth > this.options.maxDepth) {
        continue;
      }

      const result = this.frontier.enqueue(normalized, childDepth);
      if (result === 'duplicate' || result === 'cached') {
        this.stats.duplicatesFiltered += 1;
      }
    }

    this.stats.totalLinksExtracted += links.size;
    trackQueuePeak(this.stats, this.frontier.size());
    return [...links];
  }

  private onTransientFailure(task: URLTask, outcome: Classification): void {
    if (task.retryCount >= this.options.maxRetries) {
      this.failures.record(task, outcome.reason, 'failed_retryable_exhausted');
      this.finalize(task, 'failed_retryable_exhausted', outcome.reason);
      return;
    }

    this.failures.record(task, outcome.reason, 'retrying');
    this.stats.retryAttempts += 1;

    const backoff = this.options.retryDelayMs * this.options.backoffFactor ** task.retryCount;
    this.frontier.requeue({
      ...task,
      retryCount: task.retryCount + 1,
      notBefore: this.clock.now() + backoff,
    });
  }

  private onRateLimited(task: URLTask, outcome: Classification, newlySkipped: boolean): void {
    if (!newlySkipped && !this.rateLimiter.isSkipped(task.domain)) {
      // Domain-level backoff handles the delay; the task keeps its retry budget.
      this.failures.record(task, outcome.reason, 'rate_limited');
      this.frontier.requeue(task);
      return;
    }

    this.failures.record(task, outcome.reason, 'skipped');
    this.finalize(task, 'skipped');

    for (const drained of this.frontier.drainDomain(task.domain)) {
      this.failures.record(drained, DOMAIN_SKIPPED_REASON, 'skipped');
      this.finalize(drained, 'skipped');
    }
  }

  private finalize(task: URLTask, status: CacheStatus, reason?: string): void {
    this.cache.mark(task.url, status);
    this.frontier.complete(task.url);
    this.processedCount += 1;

    if (status === 'success') {
      this.stats.pagesSucceeded += 1;
      return;
    }

    if (status === 'skipped') {
      this.stats.pagesSkipped += 1;
      return;
    }

    this.stats.pagesFailed += 1;
    this.runtime.handlers.onError?.(
      createFetchError(reason ?? 'Request failed', { url: task.url, status }),
      { url: task.url, depth: task.depth },
    );
  }

  private trackConsecutiveErrors(succeeded: boolean): void {
    if (succeeded) {
      this.consecutiveErrors = 0;
      return;
    }

    this.consecutiveErrors += 1;
    if (this.consecutiveErrors > this.options.maxConsecutiveErrors && !this.stopReason) {
      this.logger.error(
        { consecutiveErrors: this.consecutiveErrors, threshold: this.options.maxConsecutiveErrors },
        'consecutive error threshold exceeded; aborting crawl',
      );
      this.stop('error_threshold');
    }
  }

  /** Content processing is fire-and-forget: its failures are reported, never awaited. */
  private deliver(page: PageResult): void {
    void Promise.resolve()
      .then(() => this.runtime.handlers.onPage(page))
      .catch((error: unknown) => {
        const crawlerError = reportCrawlerError(
          error,
          { stage: 'content', url: page.url, depth: page.depth },
          { defaultKind: 'internal', defaultSeverity: 'recoverable', throwOnFatal: false },
        );
        this.runtime.handlers.onError?.(crawlerError, { url: page.url, depth: page.depth });
      });
  }

  private async maybeCheckpoint(): Promise<void> {
    if (!this.checkpoints.isDue(this.processedCount)) {
      return;
    }

    this.checkpoints.reset(this.processedCount);
    await this.writeCheckpoint();
  }

  /**
   * Frontier, cache and domain state are captured in the same tick so the
   * checkpoint and cache file always describe one consistent moment. Writes
   * are chained so an older snapshot never lands after a newer one. While the
   * cache file is unusable the cache travels inside the checkpoint instead.
   */
  private writeCheckpoint(): Promise<void> {
    const cacheRecord = this.cache.snapshot();
    const payload: CheckpointPayload = {
      frontier: this.frontier.snapshot(),
      cacheRef: this.cachePersistenceEnabled ? (this.cache.path ?? '') : '',
      processedCount: this.processedCount,
      domains: this.rateLimiter.snapshot(),
      ...(this.cachePersistenceEnabled ? {} : { cache: cacheRecord }),
    };

    const write = this.checkpointChain.then(async () => {
      await this.persistCache(cacheRecord);
      await this.checkpoints.save(payload);
    });

    this.checkpointChain = write.catch(() => undefined);
    return write;
  }

  private async persistCache(record: CacheRecord): Promise<void> {
    if (!this.cachePersistenceEnabled) {
      return;
    }

    try {
      await this.cache.persist(record);
    } catch (error) {
      const cacheError = ensureCrawlerError(error, { kind: 'cache' });
      const { checkpointMandatory } = this.options;
      reportCrawlerError(
        new CrawlerError({
          message: cacheError.message,
          kind: 'cache',
          severity: checkpointMandatory ? 'fatal' : 'recoverable',
          details: cacheError.details,
          cause: cacheError.cause,
        }),
        { stage: 'cache-persist' },
        { throwOnFatal: checkpointMandatory },
      );
    }
  }

  private budgetReached(): boolean {
    return this.options.maxPages > 0 && this.processedCount >= this.options.maxPages;
  }

  private stop(reason: ExitReason): void {
    if (!this.stopReason) {
      this.stopReason = reason;
      this.logger.info({ reason }, 'stopping crawl');
    }
    this.stopController.abort();
  }

  private buildSummary(): CrawlSummary {
    const exitReason = this.stopReason ?? (this.budgetReached() ? 'budget_reached' : 'completed');

    return buildCrawlSummary({
      stats: this.stats,
      frontier: this.frontier,
      failures: this.failures,
      processedCount: this.processedCount,
      skippedDomains: this.rateLimiter.skippedDomains(),
      cacheCounts: this.cache.counts(),
      exitReason,
      resumed: this.resumed,
      startTime: this.startTime,
      now: this.clock.now(),
    });
  }

  private attachSignalHandlers(): void {
    const { signal, handleSignals } = this.runtime;
    signal?.addEventListener('abort', this.abortHandler, { once: true });

    if (handleSignals) {
      process.once('SIGINT', this.sigintHandler);
      this.sigintAttached = true;
    }
  }

  private detachSignalHandlers(): void {
    this.runtime.signal?.removeEventListener('abort', this.abortHandler);

    if (this.sigintAttached) {
      process.removeListener('SIGINT', this.sigintHandler);
      this.sigintAttached = false;
    }
  }
}

export async function crawl(runtime: CrawlRuntimeOptions): Promise<CrawlSummary> {
  setOutputConfig({ quiet: runtime.options.quiet });
  const engine = new CrawlerEngine(runtime);

  try {
    const summary = await engine.run();
    runtime.handlers.onComplete?.(summary);
    return summary;
  } finally {
    resetOutputConfig();
  }
}
