import logger from './logger';
import type { GameDataMirror } from './game-data/mirror';

export interface GameDataSyncWorkerOptions {
  enabled: boolean;
  intervalMs: number;
}

export interface GameDataSyncWorker {
  /** Settles once the first sync pass has finished. */
  ready: Promise<void>;
  stop: () => void;
}

const runSyncPass = async (mirror: GameDataMirror) => {
  try {
    const outcomes = await mirror.syncAll();
    const failed = outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.dataset);
    if (failed.length > 0) {
      logger.warn('[GAME-DATA/WORKER] Sync pass finished with failures', { failed });
    } else {
      logger.debug('[GAME-DATA/WORKER] Sync pass finished');
    }
  } catch (error) {
    logger.error('[GAME-DATA/WORKER] Sync pass aborted', error);
  }
};

/**
 * Runs one sync pass right away and then another `intervalMs` after each
 * pass completes, so passes never overlap.
 */
export const startGameDataSyncWorker = (
  mirror: GameDataMirror,
  { enabled, intervalMs }: GameDataSyncWorkerOptions
): GameDataSyncWorker => {
  if (!enabled) {
    logger.info('[GAME-DATA/WORKER] Disabled via environment variable');
    return { ready: Promise.resolve(), stop: () => undefined };
  }

  let stopped = false;
  let timer: NodeJS.Timeout | null = null;

  const schedule = () => {
    if (stopped) {
      return;
    }
    timer = setTimeout(() => {
      timer = null;
      void runSyncPass(mirror).then(schedule);
    }, intervalMs);
    timer.unref();
  };

  const ready = runSyncPass(mirror).then(schedule);

  return {
    ready,
    stop: () => {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    }
  };
};
