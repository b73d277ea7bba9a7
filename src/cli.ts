#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { loadConfigFile } from './config/configFile.js';
import { crawlOrchestrator, LOG_LEVELS, resolveOptions } from './index.js';
import { createConfigurationError } from './errors.js';
import { configureLogger } from './logger.js';
import { DedupCache } from './crawler/state/dedupCache.js';
import { CheckpointManager } from './crawler/checkpoint.js';
import type { CrawlOrchestratorOptions, LogLevel, ResumeMode } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('crawl-orchestrator')
  .description('Polite, resumable multi-domain crawler with per-domain backoff and checkpoints.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Crawl outward from one or more seed URLs.')
  .argument('<urls...>', 'Seed URLs to start from.')
  .option('--config <path>', 'YAML config file; command-line flags override its values.')
  .option('--max-depth <number>', 'Maximum link depth from a seed. (default: 2)')
  .option('--max-pages <number>', 'Stop accepting new URLs after this many; 0 is unlimited.')
  .option('--concurrency <number>', 'Maximum number of concurrent fetches. (default: 2)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 30000)')
  .option('--delay <seconds>', 'Minimum delay between requests to one domain. (default: 1)')
  .option('--max-delay <seconds>', 'Upper bound for rate-limit backoff. (default: 60)')
  .option('--backoff-factor <number>', 'Multiplier applied to the delay on each rate-limit response. (default: 2)')
  .option('--max-retries <number>', 'Retries for transient failures. (default: 3)')
  .option('--max-domain-errors <number>', 'Consecutive rate-limit responses before a domain is skipped. (default: 5)')
  .option('--max-consecutive-errors <number>', 'Consecutive failed fetches before the crawl stops. (default: 20)')
  .option('--max-rpm <number>', 'Global requests per minute across all domains; 0 disables. (default: 0)')
  .option('--resume <mode>', 'Checkpoint handling: disabled, continue or clear. (default: disabled)')
  .option('--state-dir <path>', 'Directory for the URL cache and checkpoint. (default: .crawl-state)')
  .option('--merge-cache <path>', 'Merge another URL cache file into this run before crawling.')
  .option('--checkpoint-every <number>', 'Write a checkpoint after this many processed URLs. (default: 10)')
  .option('--checkpoint-mandatory', 'Treat checkpoint and cache failures as fatal.')
  .option('--all-hosts', 'Follow links to hosts other than the seeds.')
  .option('--quiet', 'Suppress per-page output and failure lines; print only the summary.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (urls: string[], options: Record<string, unknown>) => {
    try {
      const config = await buildConfig(options);
      configureLogger({ level: config.logLevel ?? 'info' });
      const summary = await crawlOrchestrator(urls, { ...config, logLevel: undefined });
      if (summary.exitReason === 'error_threshold') {
        process.exitCode = 2;
      }
    } catch (error) {
      reportCliError(error);
    }
  });

program
  .command('clear')
  .description('Delete the URL cache and checkpoint for a state directory.')
  .option('--config <path>', 'YAML config file naming the state files.')
  .option('--state-dir <path>', 'Directory for the URL cache and checkpoint. (default: .crawl-state)')
  .action(async (options: Record<string, unknown>) => {
    try {
      const resolved = resolveOptions(await buildConfig(options));
      await new DedupCache(resolved.cacheFile).clear();
      await new CheckpointManager({
        filePath: resolved.checkpointFile,
        configFingerprint: '',
        everyPages: 0,
        intervalMs: 0,
        mandatory: false,
      }).clear();
      process.stdout.write(`Cleared ${resolved.cacheFile} and ${resolved.checkpointFile}\n`);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function buildConfig(rawOptions: Record<string, unknown>): Promise<CrawlOrchestratorOptions> {
  const config: CrawlOrchestratorOptions =
    rawOptions.config === undefined ? {} : await loadConfigFile(String(rawOptions.config));

  if (rawOptions.maxDepth !== undefined) {
    config.maxDepth = asNumber(rawOptions.maxDepth, 'max-depth');
  }

  if (rawOptions.maxPages !== undefined) {
    config.maxPages = asNumber(rawOptions.maxPages, 'max-pages');
  }

  if (rawOptions.concurrency !== undefined) {
    config.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.delay !== undefined) {
    config.delayMs = Math.round(asNumber(rawOptions.delay, 'delay') * 1_000);
  }

  if (rawOptions.maxDelay !== undefined) {
    config.maxDelayMs = Math.round(asNumber(rawOptions.maxDelay, 'max-delay') * 1_000);
  }

  if (rawOptions.backoffFactor !== undefined) {
    config.backoffFactor = asNumber(rawOptions.backoffFactor, 'backoff-factor');
  }

  if (rawOptions.maxRetries !== undefined) {
    config.maxRetries = asNumber(rawOptions.maxRetries, 'max-retries');
  }

  if (rawOptions.maxDomainErrors !== undefined) {
    config.maxDomainErrors = asNumber(rawOptions.maxDomainErrors, 'max-domain-errors');
  }

  if (rawOptions.maxConsecutiveErrors !== undefined) {
    config.maxConsecutiveErrors = asNumber(rawOptions.maxConsecutiveErrors, 'max-consecutive-errors');
  }

  if (rawOptions.maxRpm !== undefined) {
    config.maxRequestsPerMinute = asNumber(rawOptions.maxRpm, 'max-rpm');
  }

  if (rawOptions.resume !== undefined) {
    const resume = String(rawOptions.resume).toLowerCase();
    if (!isResumeMode(resume)) {
      throw createConfigurationError(`Unsupported resume mode: ${resume}`, { value: resume });
    }
    config.resume = resume;
  }

  if (rawOptions.stateDir !== undefined) {
    config.stateDir = String(rawOptions.stateDir);
  }

  if (rawOptions.mergeCache !== undefined) {
    config.mergeCacheFile = String(rawOptions.mergeCache);
  }

  if (rawOptions.checkpointEvery !== undefined) {
    config.checkpointEveryPages = asNumber(rawOptions.checkpointEvery, 'checkpoint-every');
  }

  if (rawOptions.checkpointMandatory === true) {
    config.checkpointMandatory = true;
  }

  if (rawOptions.allHosts === true) {
    config.sameHostOnly = false;
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    const level = String(rawOptions.logLevel).toLowerCase();
    if (!isLogLevel(level)) {
      throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
    }
    config.logLevel = level;
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isResumeMode(value: string): value is ResumeMode {
  return value === 'disabled' || value === 'continue' || value === 'clear';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
