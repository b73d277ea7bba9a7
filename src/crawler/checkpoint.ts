import { readFile, rm } from 'node:fs/promises';

import { createCheckpointError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type { CheckpointState } from '../types.js';
import { isMissingFileError, writeFileAtomic } from '../util/atomicWrite.js';
import { systemClock, type Clock } from '../util/clock.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { CheckpointStateSchema } from './state/schemas.js';

export interface CheckpointManagerOptions {
  filePath: string;
  configFingerprint: string;
  /** Checkpoint after this many newly processed tasks; 0 disables. */
  everyPages: number;
  /** Checkpoint after this much elapsed time, as seen by the next `isDue` call; 0 disables. */
  intervalMs: number;
  /** When set, a failed write is fatal instead of a warning. */
  mandatory: boolean;
}

export type CheckpointPayload = Omit<CheckpointState, 'version' | 'configFingerprint' | 'createdAt'>;

export class CheckpointManager {
  private readonly logger = componentLogger('checkpoint');
  private lastProcessed = 0;
  private lastWrittenAt: number;
  private queue: Promise<unknown> = Promise.resolve();
  private writes = 0;

  constructor(
    private readonly options: CheckpointManagerOptions,
    private readonly clock: Clock = systemClock,
  ) {
    this.lastWrittenAt = clock.now();
  }

  get path(): string {
    return this.options.filePath;
  }

  get writeCount(): number {
    return this.writes;
  }

  /** Baseline for interval accounting, e.g. the processed count restored on resume. */
  reset(processedCount: number): void {
    this.lastProcessed = processedCount;
    this.lastWrittenAt = this.clock.now();
  }

  isDue(processedCount: number): boolean {
    const { everyPages, intervalMs } = this.options;

    if (everyPages > 0 && processedCount - this.lastProcessed >= everyPages) {
      return true;
    }

    return intervalMs > 0 && this.clock.now() - this.lastWrittenAt >= intervalMs;
  }

  /**
   * Queues a write behind any in-progress one so there is a single writer.
   * Resolves true when the file was written; a failure resolves false unless
   * checkpoints are mandatory, in which case it rejects.
   */
  save(payload: CheckpointPayload): Promise<boolean> {
    const state: CheckpointState = {
      version: 1,
      ...payload,
      configFingerprint: this.options.configFingerprint,
      createdAt: new Date(this.clock.now()).toISOString(),
    };

    this.lastProcessed = payload.processedCount;
    this.lastWrittenAt = this.clock.now();

    const write = this.queue.then(() => this.write(state));
    this.queue = write.catch(() => undefined);
    return write;
  }

  async load(): Promise<CheckpointState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.options.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      this.warnDiscarded('Checkpoint could not be read', error);
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.warnDiscarded('Checkpoint is not valid JSON', error);
      return undefined;
    }

    const result = CheckpointStateSchema.safeParse(parsed);
    if (!result.success) {
      this.warnDiscarded('Checkpoint has an unexpected shape', result.error);
      return undefined;
    }

    if (result.data.configFingerprint !== this.options.configFingerprint) {
      this.logger.warn(
        { path: this.options.filePath },
        'checkpoint was written with a different configuration; starting fresh',
      );
      return undefined;
    }

    this.logger.info(
      { path: this.options.filePath, pending: result.data.frontier.length, processed: result.data.processedCount },
      'checkpoint loaded',
    );
    return result.data;
  }

  async clear(): Promise<void> {
    await this.queue;
    await rm(this.options.filePath, { force: true });
  }

  private async write(state: CheckpointState): Promise<boolean> {
    try {
      await writeFileAtomic(this.options.filePath, `${JSON.stringify(state, null, 2)}\n`);
      this.writes += 1;
      this.logger.debug(
        { path: this.options.filePath, processed: state.processedCount, pending: state.frontier.length },
        'checkpoint written',
      );
      return true;
    } catch (error) {
      const checkpointError = createCheckpointError(
        'Failed to write checkpoint',
        { path: this.options.filePath },
        { cause: error, severity: this.options.mandatory ? 'fatal' : 'recoverable' },
      );
      reportCrawlerError(checkpointError, { stage: 'checkpoint' }, { throwOnFatal: true });
      return false;
    }
  }

  private warnDiscarded(message: string, cause: unknown): void {
    reportCrawlerError(
      createCheckpointError(`${message}; ignoring it`, { path: this.options.filePath }, { cause }),
      { stage: 'checkpoint' },
    );
  }
}
