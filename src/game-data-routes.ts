import express, { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { handleRouteError } from './errors';
import logger from './logger';
import type { GameDataMirror } from './game-data/mirror';
import { DATASETS } from './game-data/types';

const stageLookupSchema = z.object({
  levelId: z.string().default(''),
  code: z.string().default(''),
  stageId: z.string().default('')
});

const syncRequestSchema = z.object({
  dataset: z.enum(DATASETS).optional()
});

export interface GameDataRouteOptions {
  adminToken: string | null;
}

const requireAdminToken =
  (adminToken: string | null) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const provided = req.header('x-admin-token');
    if (!adminToken || !provided || provided !== adminToken) {
      logger.warn('[GAME-DATA] Rejected sync request', { requestId: req.requestId ?? null });
      res.status(403).json({ error: 'Forbidden' });
      return;
    }
    next();
  };

export const createGameDataRouter = (mirror: GameDataMirror, { adminToken }: GameDataRouteOptions) => {
  const router = express.Router();

  router.get('/arknights/stage', (req: Request, res: Response): void => {
    try {
      const { levelId, code, stageId } = stageLookupSchema.parse(req.query);
      const stage = mirror.findStage(levelId, code, stageId);
      if (!stage) {
        res.status(404).json({ error: 'Stage not found' });
        return;
      }
      res.json(stage);
    } catch (error) {
      handleRouteError(res, error, 'Stage lookup');
    }
  });

  router.get('/arknights/zone', (req: Request, res: Response): void => {
    try {
      const { levelId, code, stageId } = stageLookupSchema.parse(req.query);
      const zone = mirror.findZone(levelId, code, stageId);
      if (!zone) {
        res.status(404).json({ error: 'Zone not found' });
        return;
      }
      res.json(zone);
    } catch (error) {
      handleRouteError(res, error, 'Zone lookup');
    }
  });

  router.get('/arknights/tower/:zoneId', (req: Request, res: Response): void => {
    const tower = mirror.findTower(req.params.zoneId);
    if (!tower) {
      res.status(404).json({ error: 'Tower not found' });
      return;
    }
    res.json(tower);
  });

  router.get('/arknights/activity/:zoneId', (req: Request, res: Response): void => {
    const activity = mirror.findActivityByZoneId(req.params.zoneId);
    if (!activity) {
      res.status(404).json({ error: 'Activity not found' });
      return;
    }
    res.json(activity);
  });

  router.get('/arknights/character/:characterId', (req: Request, res: Response): void => {
    const character = mirror.findCharacter(req.params.characterId);
    if (!character) {
      res.status(404).json({ error: 'Character not found' });
      return;
    }
    res.json(character);
  });

  router.get('/arknights/status', (_req: Request, res: Response): void => {
    res.json({ datasets: mirror.status() });
  });

  /**
   * Refresh now instead of waiting for the worker
   * POST /arknights/sync?dataset=stage
   * Header: x-admin-token
   */
  router.post(
    '/arknights/sync',
    requireAdminToken(adminToken),
    async (req: Request, res: Response): Promise<void> => {
      try {
        const { dataset } = syncRequestSchema.parse(req.query);
        const outcomes = dataset ? [await mirror.syncDataset(dataset)] : await mirror.syncAll();
        logger.info('[GAME-DATA] Manual sync finished', {
          datasets: outcomes.map((outcome) => outcome.dataset),
          failed: outcomes.filter((outcome) => !outcome.ok).length,
          requestId: req.requestId ?? null
        });
        res.json({ outcomes });
      } catch (error) {
        handleRouteError(res, error, 'Game data sync');
      }
    }
  );

  return router;
};

export const registerGameDataRoutes = (app: Express, mirror: GameDataMirror, options: GameDataRouteOptions): void => {
  app.use(createGameDataRouter(mirror, options));
};
