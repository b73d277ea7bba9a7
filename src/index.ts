import { join } from 'node:path';

import { crawl } from './crawler/crawl.js';
import { createDefaultHandlers } from './crawler/handlers/defaultHandlers.js';
import { HttpFetchService } from './crawler/network/httpFetchService.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { createConfigurationError } from './errors.js';
import { configureLogger } from './logger.js';
import type {
  CrawlHandlers,
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlOrchestratorOptions,
  CrawlSummary,
  LogLevel,
  ResumeMode,
} from './types.js';
import { systemClock } from './util/clock.js';

const DEFAULT_STATE_DIR = '.crawl-state';

const DEFAULT_OPTIONS: Omit<CrawlOptions, 'cacheFile' | 'checkpointFile'> = {
  maxDepth: 2,
  maxPages: 0,
  delayMs: 1_000,
  maxDelayMs: 60_000,
  backoffFactor: 2,
  concurrency: 2,
  timeoutMs: 30_000,
  maxRetries: 3,
  retryDelayMs: 1_000,
  rateLimitStatusCodes: [429, 503],
  maxDomainErrors: 5,
  maxConsecutiveErrors: 20,
  maxRequestsPerMinute: 0,
  resume: 'disabled',
  stateDir: DEFAULT_STATE_DIR,
  mergeCacheFile: undefined,
  checkpointEveryPages: 10,
  checkpointIntervalMs: 30_000,
  checkpointMandatory: false,
  sameHostOnly: true,
  quiet: false,
  logLevel: 'silent',
};

const VALID_RESUME_MODES: ResumeMode[] = ['disabled', 'continue', 'clear'];
export const LOG_LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export async function crawlOrchestrator(
  seedUrls: readonly string[],
  config: CrawlOrchestratorConfig = {},
): Promise<CrawlSummary> {
  const seeds = validateSeeds(seedUrls);
  const options = resolveOptions(config);

  if (config.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }

  const handlers: CrawlHandlers = {
    ...createDefaultHandlers(),
    ...(config.handlers ?? {}),
  };

  return crawl({
    seeds,
    options,
    handlers,
    fetchService: config.fetchService ?? new HttpFetchService(),
    clock: config.clock ?? systemClock,
    signal: config.signal,
    handleSignals: config.handleSignals ?? true,
  });
}

export function validateSeeds(seedUrls: readonly string[]): string[] {
  if (seedUrls.length === 0) {
    throw createConfigurationError('At least one seed URL is required.');
  }

  const seeds = new Set<string>();
  for (const seed of seedUrls) {
    seeds.add(validateSeed(seed));
  }

  return [...seeds];
}

function validateSeed(seed: string): string {
  let url: URL;

  try {
    url = new URL(seed);
  } catch {
    throw createConfigurationError(`Invalid URL: ${seed}`, { seed });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Seed URLs must use http or https protocol.', {
      protocol: url.protocol,
      seed,
    });
  }

  const normalized = normalizeUrl(url.href);
  if (!normalized) {
    throw createConfigurationError('Unable to normalize seed URL.', { seed });
  }

  return normalized;
}

/**
 * Merges `config` over the defaults, validates every field once and returns a
 * frozen value; nothing downstream re-reads configuration.
 */
export function resolveOptions(config: CrawlOrchestratorOptions = {}): Readonly<CrawlOptions> {
  const resume = config.resume ?? DEFAULT_OPTIONS.resume;
  if (!VALID_RESUME_MODES.includes(resume)) {
    throw createConfigurationError(`Unsupported resume mode: ${resume}`, { resume });
  }

  const logLevel = config.logLevel ?? DEFAULT_OPTIONS.logLevel;
  if (!LOG_LEVELS.includes(logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${logLevel}`, { logLevel });
  }

  const stateDir = config.stateDir ?? DEFAULT_OPTIONS.stateDir;
  const maxDelayMs = coerceNonNegativeInteger((config.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs), 'max-delay');
  const delayMs = coerceNonNegativeInteger((config.delayMs ?? DEFAULT_OPTIONS.delayMs), 'delay');
  if (maxDelayMs < delayMs) {
    throw createConfigurationError('max-delay must be at least the base delay.', { delayMs, maxDelayMs });
  }

  const backoffFactor = config.backoffFactor ?? DEFAULT_OPTIONS.backoffFactor;
  if (!Number.isFinite(backoffFactor) || backoffFactor < 1) {
    throw createConfigurationError('backoff-factor must be a number of at least 1.', { backoffFactor });
  }

  const rateLimitStatusCodes = [...(config.rateLimitStatusCodes ?? DEFAULT_OPTIONS.rateLimitStatusCodes)];
  for (const code of rateLimitStatusCodes) {
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      throw createConfigurationError(`Invalid rate-limit status code: ${code}`, { code });
    }
  }

  const options: CrawlOptions = {
    maxDepth: coerceNonNegativeInteger((config.maxDepth ?? DEFAULT_OPTIONS.maxDepth), 'max-depth'),
    maxPages: coerceNonNegativeInteger((config.maxPages ?? DEFAULT_OPTIONS.maxPages), 'max-pages'),
    delayMs,
    maxDelayMs,
    backoffFactor,
    concurrency: coercePositiveInteger((config.concurrency ?? DEFAULT_OPTIONS.concurrency), 'concurrency'),
    timeoutMs: coercePositiveInteger((config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs), 'timeout-ms'),
    maxRetries: coerceNonNegativeInteger((config.maxRetries ?? DEFAULT_OPTIONS.maxRetries), 'max-retries'),
    retryDelayMs: coerceNonNegativeInteger((config.retryDelayMs ?? DEFAULT_OPTIONS.retryDelayMs), 'retry-delay'),
    rateLimitStatusCodes: Object.freeze(rateLimitStatusCodes),
    maxDomainErrors: coerceNonNegativeInteger((config.maxDomainErrors ?? DEFAULT_OPTIONS.maxDomainErrors), 'max-domain-errors'),
    maxConsecutiveErrors: coercePositiveInteger((config.maxConsecutiveErrors ?? DEFAULT_OPTIONS.maxConsecutiveErrors), 'max-consecutive-errors'),
    maxRequestsPerMinute: coerceNonNegativeInteger((config.maxRequestsPerMinute ?? DEFAULT_OPTIONS.maxRequestsPerMinute), 'max-requests-per-minute'),
    resume,
    stateDir,
    cacheFile: config.cacheFile ?? join(stateDir, 'url_cache.json'),
    checkpointFile: config.checkpointFile ?? join(stateDir, 'checkpoint.json'),
    mergeCacheFile: config.mergeCacheFile ?? DEFAULT_OPTIONS.mergeCacheFile,
    checkpointEveryPages: coerceNonNegativeInteger((config.checkpointEveryPages ?? DEFAULT_OPTIONS.checkpointEveryPages), 'checkpoint-every'),
    checkpointIntervalMs: coerceNonNegativeInteger((config.checkpointIntervalMs ?? DEFAULT_OPTIONS.checkpointIntervalMs), 'checkpoint-interval'),
    checkpointMandatory: config.checkpointMandatory ?? DEFAULT_OPTIONS.checkpointMandatory,
    sameHostOnly: config.sameHostOnly ?? DEFAULT_OPTIONS.sameHostOnly,
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel,
  };

  return Object.freeze(options);
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { HttpFetchService } from './crawler/network/httpFetchService.js';
export { loadConfigFile, parseConfigFile } from './config/configFile.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export { setLoggerInstance } from './logger.js';
export { configureLogger };
export type { Clock } from './util/clock.js';
export type {
  CacheEntry,
  CacheStatus,
  CrawlHandlers,
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlOrchestratorOptions,
  CrawlSummary,
  ExitReason,
  FetchRequest,
  FetchResult,
  FetchService,
  LogLevel,
  PageResult,
  ResumeMode,
} from './types.js';
