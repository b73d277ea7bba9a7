import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { createConfigurationError } from '../errors.js';
import type { CrawlOrchestratorOptions } from '../types.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const nonNegative = z.number().nonnegative();

const ConfigFileSchema = z
  .object({
    crawler: z
      .object({
        maxDepth: nonNegativeInt,
        maxPages: nonNegativeInt.nullable(),
        concurrency: positiveInt,
        timeoutSeconds: z.number().positive(),
        sameHostOnly: z.boolean(),
      })
      .partial()
      .strict(),
    rateLimit: z
      .object({
        delaySeconds: nonNegative,
        maxDelaySeconds: nonNegative,
        backoffFactor: z.number().min(1),
        maxRetries: nonNegativeInt,
        retryDelaySeconds: nonNegative,
        statusCodes: z.array(z.number().int().min(100).max(599)).min(1),
        maxDomainErrors: nonNegativeInt,
        maxConsecutiveErrors: positiveInt,
        maxRequestsPerMinute: nonNegativeInt,
      })
      .partial()
      .strict(),
    checkpoint: z
      .object({
        stateDir: z.string().min(1),
        cacheFile: z.string().min(1),
        checkpointFile: z.string().min(1),
        mergeCacheFile: z.string().min(1),
        everyPages: nonNegativeInt,
        intervalSeconds: nonNegative,
        mandatory: z.boolean(),
        resume: z.enum(['disabled', 'continue', 'clear']),
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
        quiet: z.boolean(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Reads a YAML (or JSON) config file into orchestrator options. Any failure is fatal. */
export async function loadConfigFile(filePath: string): Promise<CrawlOrchestratorOptions> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw createConfigurationError(`Unable to read config file: ${filePath}`, { path: filePath }, { cause: error });
  }

  return parseConfigFile(raw, filePath);
}

export function parseConfigFile(raw: string, source = '<inline>'): CrawlOrchestratorOptions {
  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    throw createConfigurationError(`Config file is not valid YAML: ${source}`, { path: source }, { cause: error });
  }

  const result = ConfigFileSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw createConfigurationError(`Invalid config file: ${source}`, { path: source, issues });
  }

  return toOptions(result.data);
}

function toOptions(file: ConfigFile): CrawlOrchestratorOptions {
  const options: CrawlOrchestratorOptions = {};
  const { crawler = {}, rateLimit = {}, checkpoint = {}, logging = {} } = file;

  assign(options, 'maxDepth', crawler.maxDepth);
  assign(options, 'maxPages', crawler.maxPages === null ? 0 : crawler.maxPages);
  assign(options, 'concurrency', crawler.concurrency);
  assign(options, 'timeoutMs', secondsToMs(crawler.timeoutSeconds));
  assign(options, 'sameHostOnly', crawler.sameHostOnly);

  assign(options, 'delayMs', secondsToMs(rateLimit.delaySeconds));
  assign(options, 'maxDelayMs', secondsToMs(rateLimit.maxDelaySeconds));
  assign(options, 'backoffFactor', rateLimit.backoffFactor);
  assign(options, 'maxRetries', rateLimit.maxRetries);
  assign(options, 'retryDelayMs', secondsToMs(rateLimit.retryDelaySeconds));
  assign(options, 'rateLimitStatusCodes', rateLimit.statusCodes);
  assign(options, 'maxDomainErrors', rateLimit.maxDomainErrors);
  assign(options, 'maxConsecutiveErrors', rateLimit.maxConsecutiveErrors);
  assign(options, 'maxRequestsPerMinute', rateLimit.maxRequestsPerMinute);

  assign(options, 'stateDir', checkpoint.stateDir);
  assign(options, 'cacheFile', checkpoint.cacheFile);
  assign(options, 'checkpointFile', checkpoint.checkpointFile);
  assign(options, 'mergeCacheFile', checkpoint.mergeCacheFile);
  assign(options, 'checkpointEveryPages', checkpoint.everyPages);
  assign(options, 'checkpointIntervalMs', secondsToMs(checkpoint.intervalSeconds));
  assign(options, 'checkpointMandatory', checkpoint.mandatory);
  assign(options, 'resume', checkpoint.resume);

  assign(options, 'logLevel', logging.level);
  assign(options, 'quiet', logging.quiet);

  return options;
}

function assign<K extends keyof CrawlOrchestratorOptions>(
  target: CrawlOrchestratorOptions,
  key: K,
  value: CrawlOrchestratorOptions[K] | undefined,
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function secondsToMs(value: number | undefined): number | undefined {
  return value === undefined ? undefined : Math.round(value * 1_000);
}
