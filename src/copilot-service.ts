import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { parseCopilotContent } from './copilot-content';
import { ApiError } from './errors';
import logger from './logger';
import type { GameDataMirror } from './game-data/mirror';
import type { Zone } from './game-data/types';
import type { CopilotRecord, CopilotRepository, OperatorRef } from './repositories/copilot-repository';
import type { LoginUser } from './session-store';

export type GameDataLookup = Pick<
  GameDataMirror,
  'findStage' | 'findZoneById' | 'findTower' | 'findCharacter' | 'findActivityByZoneId'
>;

const MAX_PAGE_SIZE = 50;

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1')])
  .default(true);

export const copilotQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(10),
  levelKeyword: z.string().trim().optional(),
  operator: z.string().trim().optional(),
  content: z.string().trim().optional(),
  uploaderId: z.string().trim().optional(),
  orderBy: z.enum(['id', 'views', 'uploadTime']).default('uploadTime'),
  desc: booleanFlag
});

export type CopilotQueriesRequest = z.infer<typeof copilotQuerySchema>;

export const copilotUploadSchema = z.object({
  content: z.string().min(1)
});

export const copilotUpdateSchema = z.object({
  id: z.string().trim().min(1),
  content: z.string().min(1)
});

export const copilotDeleteSchema = z.object({
  id: z.string().trim().min(1)
});

export interface LevelInfo {
  stageId: string;
  code: string;
  name: string | null;
  zoneName: string | null;
  activityName: string | null;
  towerName: string | null;
}

export interface OperatorInfo {
  name: string;
  id: string | null;
  skill: number | null;
  displayName: string | null;
}

export interface CopilotInfo {
  id: string;
  uploaderId: string;
  uploader: string;
  uploadTime: string;
  firstUploadTime: string;
  views: number;
  title: string;
  details: string;
  stageName: string;
  content: string;
  level: LevelInfo | null;
  operators: OperatorInfo[];
}

export interface CopilotPageInfo {
  hasNext: boolean;
  page: number;
  total: number;
  data: CopilotInfo[];
}

const formatZoneName = (zone: Zone): string | null => {
  const parts = [zone.zoneNameFirst, zone.zoneNameSecond].filter((part): part is string => Boolean(part));
  return parts.length ? parts.join(' ') : null;
};

const containsIgnoreCase = (haystack: string | null | undefined, needle: string) =>
  Boolean(haystack) && String(haystack).toLowerCase().includes(needle.toLowerCase());

const compareValues = (left: string | number, right: string | number): number => {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
};

const parseOperatorFilter = (raw?: string) => {
  const include: string[] = [];
  const exclude: string[] = [];
  (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .forEach((entry) => {
      if (entry.startsWith('~')) {
        const name = entry.slice(1).trim();
        if (name) exclude.push(name.toLowerCase());
      } else {
        include.push(entry.toLowerCase());
      }
    });
  return { include, exclude };
};

export class CopilotService {
  constructor(
    private readonly copilots: CopilotRepository,
    private readonly gameData: GameDataLookup,
    private readonly now: () => number = Date.now
  ) {}

  async upload(loginUser: LoginUser, rawContent: string): Promise<string> {
    const content = parseCopilotContent(rawContent);
    const timestamp = this.now();
    const record: CopilotRecord = {
      id: uuidv4(),
      uploaderId: loginUser.user.userId,
      uploader: loginUser.user.userName,
      content: rawContent,
      stageName: content.stage_name,
      stageCode: content.stage_code ?? null,
      title: content.doc.title,
      details: content.doc.details ?? '',
      operators: content.opers.map((oper) => ({
        name: oper.name,
        id: oper.id ?? null,
        skill: oper.skill ?? null
      })),
      views: 0,
      uploadTime: timestamp,
      firstUploadTime: timestamp,
      deleted: false,
      deleteTime: null
    };
    await this.copilots.insert(record);
    logger.info('[COPILOT] Uploaded copilot', { copilotId: record.id, uploaderId: record.uploaderId });
    return record.id;
  }

  async update(loginUser: LoginUser, id: string, rawContent: string): Promise<void> {
    const existing = await this.requireOwned(loginUser, id);
    const content = parseCopilotContent(rawContent);
    await this.copilots.save({
      ...existing,
      content: rawContent,
      stageName: content.stage_name,
      stageCode: content.stage_code ?? null,
      title: content.doc.title,
      details: content.doc.details ?? '',
      operators: content.opers.map((oper) => ({
        name: oper.name,
        id: oper.id ?? null,
        skill: oper.skill ?? null
      })),
      uploader: loginUser.user.userName,
      uploadTime: this.now()
    });
    logger.info('[COPILOT] Updated copilot', { copilotId: id });
  }

  async delete(loginUser: LoginUser, id: string): Promise<void> {
    const existing = await this.requireOwned(loginUser, id);
    await this.copilots.save({ ...existing, deleted: true, deleteTime: this.now() });
    logger.info('[COPILOT] Deleted copilot', { copilotId: id });
  }

  async getCopilotById(id: string): Promise<CopilotInfo> {
    const record = await this.copilots.findById(id);
    if (!record || record.deleted) {
      throw new ApiError(404, 'Copilot not found');
    }
    await this.copilots.incrementViews(id);
    return this.toInfo({ ...record, views: record.views + 1 });
  }

  async queriesCopilot(request: CopilotQueriesRequest): Promise<CopilotPageInfo> {
    const { include, exclude } = parseOperatorFilter(request.operator);
    const records = await this.copilots.listActive();

    const matches = records
      .map((record) => ({ record, level: this.resolveLevel(record) }))
      .filter(({ record, level }) => {
        if (request.uploaderId && record.uploaderId !== request.uploaderId) {
          return false;
        }
        if (request.levelKeyword) {
          const keyword = request.levelKeyword;
          const levelMatch =
            containsIgnoreCase(record.stageName, keyword) ||
            containsIgnoreCase(record.stageCode, keyword) ||
            containsIgnoreCase(level?.code, keyword) ||
            containsIgnoreCase(level?.name, keyword);
          if (!levelMatch) {
            return false;
          }
        }
        if (request.content) {
          const keyword = request.content;
          if (!containsIgnoreCase(record.title, keyword) && !containsIgnoreCase(record.details, keyword)) {
            return false;
          }
        }
        const names = new Set(record.operators.map((operator) => operator.name.toLowerCase()));
        if (include.some((name) => !names.has(name))) {
          return false;
        }
        return !exclude.some((name) => names.has(name));
      });

    const direction = request.desc ? -1 : 1;
    matches.sort((a, b) => {
      const primary = compareValues(a.record[request.orderBy], b.record[request.orderBy]);
      return (primary !== 0 ? primary : compareValues(a.record.id, b.record.id)) * direction;
    });

    const start = (request.page - 1) * request.limit;
    const pageItems = matches.slice(start, start + request.limit);
    return {
      hasNext: start + request.limit < matches.length,
      page: request.page,
      total: matches.length,
      data: pageItems.map(({ record, level }) => this.toInfo(record, level))
    };
  }

  private async requireOwned(loginUser: LoginUser, id: string): Promise<CopilotRecord> {
    const existing = await this.copilots.findById(id);
    if (!existing || existing.deleted) {
      throw new ApiError(404, 'Copilot not found');
    }
    if (existing.uploaderId !== loginUser.user.userId) {
      throw new ApiError(403, 'Only the uploader can modify this copilot');
    }
    return existing;
  }

  private resolveLevel(record: CopilotRecord): LevelInfo | null {
    const stage = this.gameData.findStage(record.stageName, record.stageCode ?? '', record.stageName);
    if (!stage) {
      return null;
    }
    const zone = this.gameData.findZoneById(stage.zoneId);
    return {
      stageId: stage.stageId,
      code: stage.code,
      name: stage.name,
      zoneName: zone ? formatZoneName(zone) : null,
      activityName: this.gameData.findActivityByZoneId(stage.zoneId)?.name ?? null,
      towerName: this.gameData.findTower(stage.zoneId)?.name ?? null
    };
  }

  private describeOperator(operator: OperatorRef): OperatorInfo {
    const character = operator.id ? this.gameData.findCharacter(operator.id) : undefined;
    return {
      name: operator.name,
      id: operator.id,
      skill: operator.skill,
      displayName: character?.name ?? null
    };
  }

  private toInfo(record: CopilotRecord, level: LevelInfo | null = this.resolveLevel(record)): CopilotInfo {
    return {
      id: record.id,
      uploaderId: record.uploaderId,
      uploader: record.uploader,
      uploadTime: new Date(record.uploadTime).toISOString(),
      firstUploadTime: new Date(record.firstUploadTime).toISOString(),
      views: record.views,
      title: record.title,
      details: record.details,
      stageName: record.stageName,
      content: record.content,
      level,
      operators: record.operators.map((operator) => this.describeOperator(operator))
    };
  }
}
