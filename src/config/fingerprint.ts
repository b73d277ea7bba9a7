import { createHash } from 'node:crypto';

import type { CrawlOptions } from '../types.js';

/**
 * Hash of the options that change which URLs a crawl reaches. Operational
 * knobs (delays, concurrency, logging) are left out so they can be tuned
 * between a checkpoint and its resume.
 */
export function computeConfigFingerprint(options: CrawlOptions): string {
  const shaping = {
    maxDepth: options.maxDepth,
    maxPages: options.maxPages,
    maxRetries: options.maxRetries,
    sameHostOnly: options.sameHostOnly,
    rateLimitStatusCodes: [...options.rateLimitStatusCodes].sort((a, b) => a - b),
  };

  return createHash('sha256').update(JSON.stringify(shaping)).digest('hex');
}
