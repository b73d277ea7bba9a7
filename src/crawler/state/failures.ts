import type { FailureEvent, URLTask } from '../../types.js';
import { logError } from '../../util/output.js';

export class FailureTracker {
  private readonly log: FailureEvent[] = [];
  private readonly index = new Map<string, number[]>();

  record(task: URLTask, reason: string, outcome: FailureEvent['outcome']): FailureEvent {
    const event = createFailureEvent(task, reason, outcome);
    this.log.push(event);

    const entries = this.index.get(task.url) ?? [];
    entries.push(this.log.length - 1);
    this.index.set(task.url, entries);

    logError(renderFailure(event));
    return event;
  }

  /** Marks every earlier failure of `url` as recovered by a later attempt. */
  resolve(url: string): void {
    const entries = this.index.get(url);
    if (!entries?.length) {
      return;
    }

    for (const position of entries) {
      const event = this.log[position];
      if (event) {
        this.log[position] = { ...event, resolvedOnRetry: true };
      }
    }

    this.index.delete(url);
  }

  list(): FailureEvent[] {
    return this.log;
  }
}

export function createFailureEvent(task: URLTask, reason: string, outcome: FailureEvent['outcome']): FailureEvent {
  return {
    url: task.url,
    depth: task.depth,
    reason,
    attempt: task.retryCount + 1,
    outcome,
    resolvedOnRetry: false,
  };
}

export function renderFailure(event: FailureEvent): string {
  switch (event.outcome) {
    case 'retrying':
      return `[retry] attempt ${event.attempt} failed for ${event.url}: ${event.reason}. Scheduling retry.`;
    case 'rate_limited':
      return `[rate-limit] ${event.url}: ${event.reason}. Re-queued behind domain cooldown.`;
    case 'failed_retryable_exhausted':
      return `[retry] attempt ${event.attempt} failed for ${event.url}: ${event.reason}. No retries left.`;
    case 'skipped':
      return `[skipped] ${event.url}: ${event.reason}`;
    default:
      return `[failure] ${event.url}: ${event.reason}`;
  }
}
