export const DATASETS = ['stage', 'zone', 'activity', 'character', 'tower'] as const;

export type Dataset = (typeof DATASETS)[number];

export interface Stage {
  stageId: string;
  levelId: string | null;
  zoneId: string;
  code: string;
  name: string | null;
}

export interface Zone {
  zoneId: string;
  type: string | null;
  zoneNameFirst: string | null;
  zoneNameSecond: string | null;
}

export interface Activity {
  id: string;
  name: string;
  type: string | null;
}

export interface Character {
  id: string;
  name: string;
  profession: string | null;
  rarity: string | null;
}

export interface Tower {
  id: string;
  name: string;
  subName: string | null;
}

/**
 * Both stage indices are built from the same table and published together.
 */
export interface StageSnapshot {
  byStageId: ReadonlyMap<string, Stage>;
  byLevelId: ReadonlyMap<string, Stage>;
}

export type SyncFailureKind = 'network' | 'empty-response' | 'parse' | 'shape';

export interface SyncSuccess {
  dataset: Dataset;
  ok: true;
  count: number;
  levelCount?: number;
  syncedAt: string;
}

export interface SyncFailure {
  dataset: Dataset;
  ok: false;
  kind: SyncFailureKind;
  message: string;
  failedAt: string;
}

export type SyncOutcome = SyncSuccess | SyncFailure;

export interface DatasetStatus {
  dataset: Dataset;
  count: number;
  lastOutcome: SyncOutcome | null;
  lastSuccessAt: string | null;
}

/**
 * Supplies the raw JSON text of one dataset. Implementations reject on
 * transport failures; an empty string means the source answered with no body.
 */
export interface GameDataSource {
  fetch(dataset: Dataset): Promise<string>;
}
