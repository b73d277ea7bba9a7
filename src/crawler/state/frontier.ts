import type { FrontierEntry, URLTask } from '../../types.js';
import { systemClock, type Clock } from '../../util/clock.js';
import { domainOf, normalizeUrl } from '../url/normalizeUrl.js';
import type { DedupCache } from './dedupCache.js';

export type EnqueueResult = 'accepted' | 'invalid' | 'depth' | 'cached' | 'duplicate' | 'budget';

export interface FrontierOptions {
  maxDepth: number;
  /** 0 means unlimited. */
  maxPages: number;
}

const COMPACT_THRESHOLD = 32;

/** FIFO bucket with amortised O(1) shift, as used for each depth level. */
class DepthBucket {
  private items: URLTask[] = [];
  private head = 0;

  push(task: URLTask): void {
    this.items.push(task);
  }

  unshift(task: URLTask): void {
    if (this.head > 0) {
      this.head -= 1;
      this.items[this.head] = task;
      return;
    }
    this.items.unshift(task);
  }

  shift(): URLTask | undefined {
    const next = this.items[this.head];
    if (!next) {
      return undefined;
    }

    this.head += 1;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  removeWhere(predicate: (task: URLTask) => boolean): URLTask[] {
    const live = this.items.slice(this.head);
    const removed = live.filter(predicate);
    this.items = live.filter((task) => !predicate(task));
    this.head = 0;
    return removed;
  }

  values(): URLTask[] {
    return this.items.slice(this.head);
  }

  get size(): number {
    return this.items.length - this.head;
  }
}

/**
 * Pending work, bucketed by depth so shallow pages always dequeue before deeper
 * ones. Every mutator is synchronous: on a single event loop the dedup check
 * and the insert cannot interleave with another worker.
 */
export class Frontier {
  private readonly buckets = new Map<number, DepthBucket>();
  private readonly pending = new Set<string>();
  private readonly inFlight = new Map<string, URLTask>();
  private accepted = 0;

  constructor(
    private readonly options: FrontierOptions,
    private readonly cache: DedupCache,
    private readonly clock: Clock = systemClock,
  ) {}

  enqueue(url: string, depth: number): EnqueueResult {
    const normalized = normalizeUrl(url);
    if (!normalized) {
      return 'invalid';
    }

    if (!Number.isInteger(depth) || depth < 0 || depth > this.options.maxDepth) {
      return 'depth';
    }

    if (this.cache.contains(normalized)) {
      return 'cached';
    }

    if (this.pending.has(normalized) || this.inFlight.has(normalized)) {
      return 'duplicate';
    }

    if (this.budgetExhausted()) {
      return 'budget';
    }

    this.accepted += 1;
    this.push({
      url: normalized,
      depth,
      domain: domainOf(normalized),
      retryCount: 0,
      discoveredAt: this.clock.now(),
    });
    return 'accepted';
  }

  dequeue(): URLTask | undefined {
    for (const depth of this.sortedDepths()) {
      const bucket = this.buckets.get(depth);
      const task = bucket?.shift();
      if (!task) {
        continue;
      }

      if (bucket && bucket.size === 0) {
        this.buckets.delete(depth);
      }

      this.pending.delete(task.url);
      this.inFlight.set(task.url, task);
      return task;
    }

    return undefined;
  }

  /** Puts an in-flight task back at the tail of its depth for another attempt. */
  requeue(task: URLTask): void {
    this.inFlight.delete(task.url);
    this.push(task);
  }

  /** Returns an in-flight task that was never attempted to the head of its depth. */
  release(task: URLTask): void {
    this.inFlight.delete(task.url);
    this.pending.add(task.url);
    this.bucketFor(task.depth).unshift(task);
  }

  complete(url: string): void {
    this.inFlight.delete(url);
  }

  drainDomain(domain: string): URLTask[] {
    const drained: URLTask[] = [];

    for (const [depth, bucket] of this.buckets) {
      drained.push(...bucket.removeWhere((task) => task.domain === domain));
      if (bucket.size === 0) {
        this.buckets.delete(depth);
      }
    }

    for (const task of drained) {
      this.pending.delete(task.url);
    }

    return drained;
  }

  size(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get acceptedCount(): number {
    return this.accepted;
  }

  /** Pending and in-flight work: everything that has not reached a terminal state. */
  snapshot(): FrontierEntry[] {
    const entries: FrontierEntry[] = [...this.inFlight.values()].map(toEntry);

    for (const depth of this.sortedDepths()) {
      const bucket = this.buckets.get(depth);
      if (bucket) {
        entries.push(...bucket.values().map(toEntry));
      }
    }

    return entries;
  }

  /**
   * Rehydrates from a checkpoint. `processedCount` tasks were already finished
   * in the earlier run and still count against the page budget.
   */
  restore(entries: readonly FrontierEntry[], processedCount: number): number {
    let restored = 0;

    for (const entry of entries) {
      const normalized = normalizeUrl(entry.url);
      if (!normalized || entry.depth > this.options.maxDepth) {
        continue;
      }

      if (this.cache.contains(normalized) || this.pending.has(normalized) || this.inFlight.has(normalized)) {
        continue;
      }

      this.push({
        url: normalized,
        depth: entry.depth,
        domain: domainOf(normalized),
        retryCount: entry.retryCount,
        discoveredAt: this.clock.now(),
      });
      restored += 1;
    }

    this.accepted = processedCount + restored;
    return restored;
  }

  private budgetExhausted(): boolean {
    return this.options.maxPages > 0 && this.accepted >= this.options.maxPages;
  }

  private push(task: URLTask): void {
    this.pending.add(task.url);
    this.bucketFor(task.depth).push(task);
  }

  private bucketFor(depth: number): DepthBucket {
    let bucket = this.buckets.get(depth);
    if (!bucket) {
      bucket = new DepthBucket();
      this.buckets.set(depth, bucket);
    }
    return bucket;
  }

  private sortedDepths(): number[] {
    return [...this.buckets.keys()].sort((a, b) => a - b);
  }
}

function toEntry(task: URLTask): FrontierEntry {
  return { url: task.url, depth: task.depth, retryCount: task.retryCount };
}
