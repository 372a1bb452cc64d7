import { GraphQLError } from 'graphql';
import { ZodError } from 'zod';
import logger from '../logger';
import { copilotQuerySchema, type CopilotService } from '../copilot-service';
import { ApiError } from '../errors';
import type { GameDataMirror } from '../game-data/mirror';

export interface ResolverDependencies {
  copilotService: CopilotService;
  mirror: GameDataMirror;
}

interface StageLookupArgs {
  levelId?: string | null;
  code?: string | null;
  stageId?: string | null;
}

// GraphQL passes omitted nullable arguments as undefined and explicit nulls as null;
// zod defaults only apply to undefined.
const withoutNulls = (args: Record<string, unknown>) =>
  Object.fromEntries(Object.entries(args).filter(([, value]) => value !== null));

const toGraphQLError = (error: unknown, operation: string): GraphQLError => {
  if (error instanceof ApiError) {
    return new GraphQLError(error.message, {
      extensions: { code: 'BAD_REQUEST', http: { status: error.statusCode }, errorCode: error.code }
    });
  }
  if (error instanceof ZodError) {
    return new GraphQLError(error.issues.map((issue) => issue.message).join('; '), {
      extensions: { code: 'BAD_USER_INPUT' }
    });
  }
  logger.error(`[GRAPHQL] ${operation} failed`, error);
  return new GraphQLError('Internal server error', { extensions: { code: 'INTERNAL_SERVER_ERROR' } });
};

export const createQueryResolvers = ({ copilotService, mirror }: ResolverDependencies) => ({
  // Copilot Queries
  async copilot(_parent: unknown, { id }: { id: string }) {
    try {
      return await copilotService.getCopilotById(id);
    } catch (error) {
      if (error instanceof ApiError && error.statusCode === 404) {
        return null;
      }
      throw toGraphQLError(error, 'copilot');
    }
  },

  async copilots(_parent: unknown, args: Record<string, unknown>) {
    try {
      return await copilotService.queriesCopilot(copilotQuerySchema.parse(withoutNulls(args)));
    } catch (error) {
      throw toGraphQLError(error, 'copilots');
    }
  },

  // Game Data Queries
  stage(_parent: unknown, { levelId, code, stageId }: StageLookupArgs) {
    return mirror.findStage(levelId ?? '', code ?? '', stageId ?? '') ?? null;
  },

  zone(_parent: unknown, { levelId, code, stageId }: StageLookupArgs) {
    return mirror.findZone(levelId ?? '', code ?? '', stageId ?? '') ?? null;
  },

  tower(_parent: unknown, { zoneId }: { zoneId: string }) {
    return mirror.findTower(zoneId) ?? null;
  },

  character(_parent: unknown, { characterId }: { characterId: string }) {
    return mirror.findCharacter(characterId) ?? null;
  },

  activityByZone(_parent: unknown, { zoneId }: { zoneId: string }) {
    return mirror.findActivityByZoneId(zoneId) ?? null;
  },

  gameDataStatus() {
    return mirror.status();
  }
});
