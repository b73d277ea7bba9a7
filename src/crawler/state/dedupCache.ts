import { readFile, rm } from 'node:fs/promises';

import { createCacheError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import type { CacheEntry, CacheRecord, CacheStatus } from '../../types.js';
import { isMissingFileError, writeFileAtomic } from '../../util/atomicWrite.js';
import { systemClock, type Clock } from '../../util/clock.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { CacheRecordSchema } from './schemas.js';

/**
 * Persistent record of every URL that reached a terminal state. A URL in the
 * cache is never fetched again until the cache is cleared.
 */
export class DedupCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly logger = componentLogger('dedup-cache');

  constructor(
    private readonly filePath?: string,
    private readonly clock: Clock = systemClock,
  ) {}

  get path(): string | undefined {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  contains(url: string): boolean {
    return this.entries.has(keyFor(url));
  }

  mark(url: string, status: CacheStatus, timestamp: number = this.clock.now()): void {
    this.entries.set(keyFor(url), { status, timestamp });
  }

  /** Merges `record` in; on conflict the entry with the newer timestamp wins. */
  merge(record: CacheRecord): number {
    let changed = 0;

    for (const [url, entry] of Object.entries(record)) {
      const key = keyFor(url);
      const current = this.entries.get(key);
      if (current && current.timestamp >= entry.timestamp) {
        continue;
      }

      this.entries.set(key, { status: entry.status, timestamp: entry.timestamp });
      changed += 1;
    }

    return changed;
  }

  /**
   * Loads the cache file, when one is configured. A missing file counts as
   * empty; an unreadable one throws.
   */
  async load(): Promise<number> {
    if (!this.filePath) {
      return 0;
    }

    const merged = this.merge(await readCacheFile(this.filePath));
    this.logger.debug({ merged, size: this.entries.size }, 'cache loaded');
    return merged;
  }

  /** Merges an externally supplied cache file in, under the same conflict rule. */
  async mergeFile(filePath: string): Promise<number> {
    const merged = this.merge(await readCacheFile(filePath));
    this.logger.debug({ path: filePath, merged, size: this.entries.size }, 'external cache merged');
    return merged;
  }

  /** Atomically writes `record` (by default the current contents) to the cache file. */
  async persist(record: CacheRecord = this.snapshot()): Promise<void> {
    if (!this.filePath) {
      return;
    }

    try {
      await writeFileAtomic(this.filePath, `${JSON.stringify(record, null, 2)}\n`);
    } catch (error) {
      throw createCacheError('Failed to persist URL cache', { path: this.filePath }, { cause: error });
    }
  }

  async clear(): Promise<void> {
    this.entries.clear();
    if (this.filePath) {
      await rm(this.filePath, { force: true });
    }
  }

  snapshot(): CacheRecord {
    return Object.fromEntries(this.entries.entries());
  }

  counts(): Record<CacheStatus, number> {
    const counts: Record<CacheStatus, number> = {
      success: 0,
      failed_retryable_exhausted: 0,
      failed_permanent: 0,
      skipped: 0,
    };

    for (const entry of this.entries.values()) {
      counts[entry.status] += 1;
    }

    return counts;
  }
}

function keyFor(url: string): string {
  return normalizeUrl(url) ?? url;
}

async function readCacheFile(filePath: string): Promise<CacheRecord> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw createCacheError('Unable to read URL cache', { path: filePath }, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createCacheError('URL cache is not valid JSON', { path: filePath }, { cause: error });
  }

  const result = CacheRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw createCacheError('URL cache has an unexpected shape', {
      path: filePath,
      issues: result.error.issues.slice(0, 3).map((issue) => issue.message),
    });
  }

  return result.data;
}
