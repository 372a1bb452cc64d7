import { randomUUID } from 'node:crypto';
import express, { Express, Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ApolloServer } from '@apollo/server';
import { expressMiddleware } from '@apollo/server/express4';
import logger from './logger';
import { typeDefs } from './graphql/schema';
import { createQueryResolvers } from './graphql/resolvers';
import type { CopilotService } from './copilot-service';
import type { GameDataMirror } from './game-data/mirror';
import type { UserService } from './user-service';
import { registerCopilotRoutes } from './copilot-routes';
import { registerGameDataRoutes } from './game-data-routes';
import { registerUserRoutes } from './user-routes';

export interface AppDependencies {
  userService: UserService;
  copilotService: CopilotService;
  mirror: GameDataMirror;
  adminToken: string | null;
}

export interface CreatedApp {
  app: Express;
  apollo: ApolloServer;
}

export const createApp = async ({
  userService,
  copilotService,
  mirror,
  adminToken
}: AppDependencies): Promise<CreatedApp> => {
  const app: Express = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    req.requestId = req.header('x-request-id') ?? randomUUID();
    logger.info(`[HTTP] ${req.method} ${req.path}`, { requestId: req.requestId });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response): void => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      gameData: mirror.status()
    });
  });

  registerUserRoutes(app, userService);
  registerCopilotRoutes(app, copilotService, userService);
  registerGameDataRoutes(app, mirror, { adminToken });

  const apollo = new ApolloServer({
    typeDefs,
    resolvers: {
      Query: createQueryResolvers({ copilotService, mirror })
    }
  });
  await apollo.start();
  app.use('/graphql', expressMiddleware(apollo));

  // Error handling middleware
  const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('[HTTP] Unhandled error', { error: err, requestId: req.requestId ?? null });
    res.status(500).json({ error: 'Internal server error' });
  };

  app.use(errorHandler);

  // 404 handler
  app.use((_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found' });
  });

  return { app, apollo };
};
