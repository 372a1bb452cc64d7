import logger, { serializeError } from '../logger';
import {
  parseActivityTable,
  parseCharacterTable,
  parseStageTable,
  parseTowerTable,
  parseZoneTable,
  type IndexAnomaly
} from './parsers';
import {
  DATASETS,
  type Activity,
  type Character,
  type Dataset,
  type DatasetStatus,
  type GameDataSource,
  type Stage,
  type StageSnapshot,
  type SyncFailure,
  type SyncFailureKind,
  type SyncOutcome,
  type Tower,
  type Zone
} from './types';

const EMPTY_STAGES: StageSnapshot = { byStageId: new Map(), byLevelId: new Map() };

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

type PublishResult =
  | { ok: true; count: number; levelCount?: number; anomalies: IndexAnomaly[] }
  | { ok: false; message: string };

/**
 * In-memory index over the external game tables.
 *
 * Every dataset is held as one immutable snapshot. A refresh parses into fresh
 * maps and then replaces the snapshot reference, so lookups always see either
 * the previous table or the new one. A failed refresh leaves the previous
 * snapshot of that dataset in place and does not affect the others.
 */
export class GameDataMirror {
  private stages: StageSnapshot = EMPTY_STAGES;
  private zones: ReadonlyMap<string, Zone> = new Map();
  private activitiesByZone: ReadonlyMap<string, Activity> = new Map();
  private characters: ReadonlyMap<string, Character> = new Map();
  private towers: ReadonlyMap<string, Tower> = new Map();

  private readonly lastOutcomes = new Map<Dataset, SyncOutcome>();
  private readonly lastSuccessAt = new Map<Dataset, string>();

  constructor(private readonly source: GameDataSource) {}

  async syncAll(): Promise<SyncOutcome[]> {
    const outcomes: SyncOutcome[] = [];
    for (const dataset of DATASETS) {
      outcomes.push(await this.syncDataset(dataset));
    }
    return outcomes;
  }

  async syncDataset(dataset: Dataset): Promise<SyncOutcome> {
    let body: string;
    try {
      body = await this.source.fetch(dataset);
    } catch (error) {
      return this.recordFailure(dataset, 'network', describeError(error), error);
    }

    if (!body.trim()) {
      return this.recordFailure(dataset, 'empty-response', 'source returned an empty body');
    }

    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      return this.recordFailure(dataset, 'parse', describeError(error));
    }

    const result = this.publish(dataset, document);
    if (!result.ok) {
      return this.recordFailure(dataset, 'shape', result.message);
    }

    result.anomalies.forEach((anomaly) => {
      logger.debug(`[GAME-DATA] Skipped ${dataset} entry`, { key: anomaly.key, reason: anomaly.reason });
    });

    const syncedAt = new Date().toISOString();
    const outcome: SyncOutcome = {
      dataset,
      ok: true,
      count: result.count,
      ...(result.levelCount !== undefined ? { levelCount: result.levelCount } : {}),
      syncedAt
    };
    this.lastOutcomes.set(dataset, outcome);
    this.lastSuccessAt.set(dataset, syncedAt);
    logger.info(`[GAME-DATA] Synced ${dataset} data`, {
      count: result.count,
      levelCount: result.levelCount,
      skipped: result.anomalies.length
    });
    return outcome;
  }

  findStage(levelId: string, code: string, stageId: string): Stage | undefined {
    const stage = this.stages.byLevelId.get(levelId.toLowerCase());
    if (stage && stage.code.toLowerCase() === code.toLowerCase()) {
      return stage;
    }
    return this.stages.byStageId.get(stageId);
  }

  findZone(levelId: string, code: string, stageId: string): Zone | undefined {
    const stage = this.findStage(levelId, code, stageId);
    if (!stage) {
      logger.warn('[GAME-DATA] Stage not found', { stageId, levelId });
      return undefined;
    }
    const zone = this.findZoneById(stage.zoneId);
    if (!zone) {
      logger.warn('[GAME-DATA] Zone not found', { zoneId: stage.zoneId, levelId });
    }
    return zone;
  }

  findZoneById(zoneId: string): Zone | undefined {
    return this.zones.get(zoneId);
  }

  findTower(zoneId: string): Tower | undefined {
    return this.towers.get(zoneId);
  }

  /**
   * Looks up by the last `_` segment of any id, including ids the index
   * itself would have rejected.
   */
  findCharacter(characterId: string): Character | undefined {
    const segments = characterId.split('_');
    return this.characters.get(segments[segments.length - 1]);
  }

  findActivityByZoneId(zoneId: string): Activity | undefined {
    return this.activitiesByZone.get(zoneId);
  }

  status(): DatasetStatus[] {
    return DATASETS.map((dataset) => ({
      dataset,
      count: this.sizeOf(dataset),
      lastOutcome: this.lastOutcomes.get(dataset) ?? null,
      lastSuccessAt: this.lastSuccessAt.get(dataset) ?? null
    }));
  }

  private sizeOf(dataset: Dataset): number {
    switch (dataset) {
      case 'stage':
        return this.stages.byStageId.size;
      case 'zone':
        return this.zones.size;
      case 'activity':
        return this.activitiesByZone.size;
      case 'character':
        return this.characters.size;
      case 'tower':
        return this.towers.size;
    }
  }

  private publish(dataset: Dataset, document: unknown): PublishResult {
    switch (dataset) {
      case 'stage': {
        const parsed = parseStageTable(document);
        if (!parsed.ok) return parsed;
        this.stages = parsed.value;
        return {
          ok: true,
          count: parsed.value.byStageId.size,
          levelCount: parsed.value.byLevelId.size,
          anomalies: parsed.anomalies
        };
      }
      case 'zone': {
        const parsed = parseZoneTable(document);
        if (!parsed.ok) return parsed;
        this.zones = parsed.value;
        return { ok: true, count: parsed.value.size, anomalies: parsed.anomalies };
      }
      case 'activity': {
        const parsed = parseActivityTable(document);
        if (!parsed.ok) return parsed;
        this.activitiesByZone = parsed.value;
        return { ok: true, count: parsed.value.size, anomalies: parsed.anomalies };
      }
      case 'character': {
        const parsed = parseCharacterTable(document);
        if (!parsed.ok) return parsed;
        this.characters = parsed.value;
        return { ok: true, count: parsed.value.size, anomalies: parsed.anomalies };
      }
      case 'tower': {
        const parsed = parseTowerTable(document);
        if (!parsed.ok) return parsed;
        this.towers = parsed.value;
        return { ok: true, count: parsed.value.size, anomalies: parsed.anomalies };
      }
    }
  }

  private recordFailure(
    dataset: Dataset,
    kind: SyncFailureKind,
    message: string,
    cause?: unknown
  ): SyncFailure {
    const outcome: SyncFailure = {
      dataset,
      ok: false,
      kind,
      message,
      failedAt: new Date().toISOString()
    };
    this.lastOutcomes.set(dataset, outcome);
    logger.error(`[GAME-DATA] Failed to sync ${dataset} data`, {
      kind,
      message,
      ...(cause !== undefined ? { error: serializeError(cause) } : {})
    });
    return outcome;
  }
}
