import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { startGameDataSyncWorker } from '../src/game-data-sync-worker';
import { GameDataMirror } from '../src/game-data/mirror';
import { StubGameDataSource } from './support/fakes';
import { gameDataBodies } from './support/game-data';

describe('startGameDataSyncWorker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('syncs right away and again after each interval', async () => {
    const source = new StubGameDataSource(gameDataBodies());
    const worker = startGameDataSyncWorker(new GameDataMirror(source), { enabled: true, intervalMs: 1000 });

    await worker.ready;
    expect(source.requests).toHaveLength(5);

    await vi.advanceTimersByTimeAsync(999);
    expect(source.requests).toHaveLength(5);

    await vi.advanceTimersByTimeAsync(1);
    expect(source.requests).toHaveLength(10);

    worker.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(source.requests).toHaveLength(10);
  });

  it('keeps running after a pass with failures', async () => {
    const source = new StubGameDataSource({});
    const mirror = new GameDataMirror(source);
    const worker = startGameDataSyncWorker(mirror, { enabled: true, intervalMs: 500 });

    await worker.ready;
    source.bodies = gameDataBodies();
    await vi.advanceTimersByTimeAsync(500);

    expect(mirror.findStage('ID_ACT1', 'S1', 'act1')?.stageId).toBe('act1');
    worker.stop();
  });

  it('does nothing when disabled', async () => {
    const source = new StubGameDataSource(gameDataBodies());
    const worker = startGameDataSyncWorker(new GameDataMirror(source), { enabled: false, intervalMs: 10 });

    await worker.ready;
    await vi.advanceTimersByTimeAsync(100);

    expect(source.requests).toEqual([]);
    worker.stop();
  });
});
