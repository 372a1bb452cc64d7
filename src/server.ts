import AWS from 'aws-sdk';
import logger from './logger';
import { createApp } from './app';
import { createRedisClient, MemoryCache, RedisCache, type KeyValueCache } from './cache';
import { loadSettings } from './config/settings';
import { CopilotService } from './copilot-service';
import { createMailTransport, EmailService } from './email-service';
import { HttpGameDataSource } from './game-data/http-source';
import { GameDataMirror } from './game-data/mirror';
import { startGameDataSyncWorker } from './game-data-sync-worker';
import { DynamoCopilotRepository } from './repositories/copilot-repository';
import { DynamoUserRepository } from './repositories/user-repository';
import { SessionStore } from './session-store';
import { UserService } from './user-service';

async function runServer() {
  try {
    const settings = loadSettings();

    // Initialize AWS SDK clients
    const dynamodb = new AWS.DynamoDB.DocumentClient({
      region: settings.awsRegion
    });

    const cache: KeyValueCache =
      settings.cache.driver === 'memory'
        ? new MemoryCache()
        : new RedisCache(createRedisClient(settings.cache.redisUrl));
    const sessions = new SessionStore(cache);

    const emailService = new EmailService(createMailTransport(settings.mail), sessions, {
      from: settings.mail.from,
      publicBaseUrl: settings.publicBaseUrl,
      activationLinkTtlSeconds: settings.mail.activationLinkTtlSeconds,
      verificationCodeTtlSeconds: settings.mail.verificationCodeTtlSeconds
    });
    const userService = new UserService(new DynamoUserRepository(dynamodb), sessions, emailService, {
      jwtSecret: settings.jwt.secret,
      jwtExpireSeconds: settings.jwt.expireSeconds
    });

    const mirror = new GameDataMirror(
      new HttpGameDataSource({
        baseUrl: settings.gameData.baseUrl,
        timeoutMs: settings.gameData.fetchTimeoutMs
      })
    );
    const copilotService = new CopilotService(new DynamoCopilotRepository(dynamodb), mirror);

    const { app } = await createApp({
      userService,
      copilotService,
      mirror,
      adminToken: settings.adminToken
    });

    const worker = startGameDataSyncWorker(mirror, {
      enabled: settings.gameData.syncEnabled,
      intervalMs: settings.gameData.syncIntervalMs
    });

    const server = app.listen(settings.port, () => {
      logger.info(`Server running on port ${settings.port}`);
      logger.info(`GraphQL endpoint available at http://localhost:${settings.port}/graphql`);
    });

    const shutdown = (signal: string) => {
      logger.info(`[SERVER] ${signal} received, shutting down`);
      worker.stop();
      server.close(() => process.exit(0));
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void runServer();
