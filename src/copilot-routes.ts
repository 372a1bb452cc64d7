import express, { Express, Request, Response } from 'express';
import { currentUser, requireAuthenticatedUser, type Authenticator } from './auth-utils';
import {
  copilotDeleteSchema,
  copilotQuerySchema,
  copilotUpdateSchema,
  copilotUploadSchema,
  type CopilotService
} from './copilot-service';
import { handleRouteError } from './errors';

export const createCopilotRouter = (copilotService: CopilotService, authenticator: Authenticator) => {
  const router = express.Router();
  const requireAuth = requireAuthenticatedUser(authenticator);

  /**
   * POST /copilot/upload
   * Body: { content } where content is the copilot JSON document as a string
   */
  router.post('/copilot/upload', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      const { content } = copilotUploadSchema.parse(req.body);
      const id = await copilotService.upload(currentUser(req), content);
      res.status(201).json({ id });
    } catch (error) {
      handleRouteError(res, error, 'Copilot upload');
    }
  });

  router.post('/copilot/delete', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      const { id } = copilotDeleteSchema.parse(req.body);
      await copilotService.delete(currentUser(req), id);
      res.json({ id, status: 'deleted' });
    } catch (error) {
      handleRouteError(res, error, 'Copilot delete');
    }
  });

  router.post('/copilot/update', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      const { id, content } = copilotUpdateSchema.parse(req.body);
      await copilotService.update(currentUser(req), id, content);
      res.json({ id, status: 'updated' });
    } catch (error) {
      handleRouteError(res, error, 'Copilot update');
    }
  });

  router.get('/copilot/get/:id', async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await copilotService.getCopilotById(req.params.id));
    } catch (error) {
      handleRouteError(res, error, 'Copilot fetch');
    }
  });

  /**
   * GET /copilot/query?page&limit&levelKeyword&operator&content&uploaderId&orderBy&desc
   */
  router.get('/copilot/query', async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await copilotService.queriesCopilot(copilotQuerySchema.parse(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'Copilot query');
    }
  });

  return router;
};

export const registerCopilotRoutes = (
  app: Express,
  copilotService: CopilotService,
  authenticator: Authenticator
): void => {
  app.use(createCopilotRouter(copilotService, authenticator));
};
