import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CheckpointManager, type CheckpointManagerOptions, type CheckpointPayload } from '../src/crawler/checkpoint.js';
import { isCrawlerError } from '../src/errors.js';
import { FakeClock } from './support/fakes.js';

let dir: string;
let clock: FakeClock;

const payload: CheckpointPayload = {
  frontier: [{ url: 'https://example.com/next', depth: 1, retryCount: 0 }],
  cacheRef: 'state/url_cache.json',
  processedCount: 4,
  domains: [
    {
      domain: 'example.com',
      lastRequestTime: 10,
      currentDelayMs: 1_000,
      cooldownUntil: 0,
      consecutiveErrors: 0,
      skipped: false,
    },
  ],
};

function createManager(overrides: Partial<CheckpointManagerOptions> = {}): CheckpointManager {
  return new CheckpointManager(
    {
      filePath: join(dir, 'checkpoint.json'),
      configFingerprint: 'fingerprint-a',
      everyPages: 3,
      intervalMs: 10_000,
      mandatory: false,
      ...overrides,
    },
    clock,
  );
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'checkpoint-'));
  clock = new FakeClock(Date.UTC(2024, 0, 1));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('CheckpointManager', () => {
  it('is due after enough processed pages or enough elapsed time', () => {
    const manager = createManager();
    manager.reset(10);

    expect(manager.isDue(12)).toBe(false);
    expect(manager.isDue(13)).toBe(true);

    clock.advance(10_000);
    expect(manager.isDue(10)).toBe(true);
  });

  it('never becomes due when both triggers are disabled', () => {
    const manager = createManager({ everyPages: 0, intervalMs: 0 });
    clock.advance(1_000_000);

    expect(manager.isDue(1_000)).toBe(false);
  });

  it('writes a versioned state stamped with the fingerprint and time', async () => {
    const manager = createManager();

    await expect(manager.save(payload)).resolves.toBe(true);

    const written: unknown = JSON.parse(await readFile(manager.path, 'utf-8'));
    expect(written).toEqual({
      version: 1,
      ...payload,
      configFingerprint: 'fingerprint-a',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
    expect(manager.writeCount).toBe(1);
    expect(manager.isDue(4)).toBe(false);
  });

  it('loads a checkpoint written with the same configuration', async () => {
    const manager = createManager();
    await manager.save(payload);

    const state = await createManager().load();

    expect(state?.processedCount).toBe(4);
    expect(state?.frontier).toEqual(payload.frontier);
    expect(state?.domains).toEqual(payload.domains);
  });

  it('discards a checkpoint written with a different configuration', async () => {
    await createManager({ configFingerprint: 'fingerprint-b' }).save(payload);

    await expect(createManager().load()).resolves.toBeUndefined();
  });

  it.each([
    ['missing', undefined],
    ['corrupt', 'not json'],
    ['malformed', JSON.stringify({ version: 2 })],
  ])('returns nothing for a %s checkpoint', async (_label, contents) => {
    if (contents !== undefined) {
      await writeFile(join(dir, 'checkpoint.json'), contents);
    }

    await expect(createManager().load()).resolves.toBeUndefined();
  });

  it('serializes concurrent saves so the last one wins', async () => {
    const manager = createManager();

    await Promise.all([
      manager.save({ ...payload, processedCount: 1 }),
      manager.save({ ...payload, processedCount: 2 }),
      manager.save({ ...payload, processedCount: 3 }),
    ]);

    expect(manager.writeCount).toBe(3);
    expect((await createManager().load())?.processedCount).toBe(3);
  });

  it('reports a failed write as recoverable unless checkpoints are mandatory', async () => {
    await writeFile(join(dir, 'blocker'), 'file');
    const unwritable = join(dir, 'blocker', 'checkpoint.json');

    await expect(createManager({ filePath: unwritable }).save(payload)).resolves.toBe(false);

    const error: unknown = await createManager({ filePath: unwritable, mandatory: true })
      .save(payload)
      .catch((reason: unknown) => reason);
    expect(isCrawlerError(error) && error.kind).toBe('checkpoint');
    expect(isCrawlerError(error) && error.severity).toBe('fatal');
  });

  it('clears the checkpoint file', async () => {
    const manager = createManager();
    await manager.save(payload);

    await manager.clear();

    await expect(manager.load()).resolves.toBeUndefined();
  });
});
