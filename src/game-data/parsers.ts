import { z } from 'zod';
import type { Activity, Character, Stage, StageSnapshot, Tower, Zone } from './types';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined || value === '' ? null : String(value)));

const stageEntrySchema = z.object({
  stageId: z.string(),
  levelId: optionalText,
  zoneId: z.string(),
  code: z.string(),
  name: optionalText
});

const stageTableSchema = z.object({
  stages: z.record(z.string(), z.unknown())
});

const zoneEntrySchema = z.object({
  zoneID: z.string(),
  type: optionalText,
  zoneNameFirst: optionalText,
  zoneNameSecond: optionalText
});

const zoneTableSchema = z.object({
  zones: z.record(z.string(), z.unknown())
});

const activityEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  type: optionalText
});

const activityTableSchema = z.object({
  zoneToActivity: z.record(z.string(), z.unknown()),
  basicInfo: z.record(z.string(), z.unknown())
});

const characterEntrySchema = z.object({
  name: z.string(),
  profession: optionalText,
  rarity: optionalText
});

const characterTableSchema = z.record(z.string(), z.unknown());

const towerEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  subName: optionalText
});

const towerTableSchema = z.object({
  towers: z.record(z.string(), z.unknown())
});

export interface IndexAnomaly {
  key: string;
  reason: string;
}

export type ParseResult<T> =
  | { ok: true; value: T; anomalies: IndexAnomaly[] }
  | { ok: false; message: string };

const describeIssues = (error: z.ZodError): string => {
  const [first] = error.issues;
  if (!first) {
    return 'document does not match the expected shape';
  }
  const location = first.path.length ? first.path.join('.') : '(root)';
  const extra = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : '';
  return `${location}: ${first.message}${extra}`;
};

/**
 * Validates each entry on its own; entries that fail are reported as
 * anomalies and left out.
 */
const validEntries = <S extends z.ZodTypeAny>(
  entries: Record<string, unknown>,
  schema: S,
  anomalies: IndexAnomaly[]
): Array<[string, z.output<S>]> => {
  const valid: Array<[string, z.output<S>]> = [];
  Object.entries(entries).forEach(([key, raw]) => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      valid.push([key, parsed.data]);
    } else {
      anomalies.push({ key, reason: describeIssues(parsed.error) });
    }
  });
  return valid;
};

export const parseStageTable = (document: unknown): ParseResult<StageSnapshot> => {
  const parsed = stageTableSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  const byStageId = new Map<string, Stage>();
  const byLevelId = new Map<string, Stage>();
  const anomalies: IndexAnomaly[] = [];
  validEntries(parsed.data.stages, stageEntrySchema, anomalies).forEach(([key, entry]) => {
    const stage: Stage = {
      stageId: entry.stageId,
      levelId: entry.levelId,
      zoneId: entry.zoneId,
      code: entry.code,
      name: entry.name
    };
    byStageId.set(key, stage);
    if (stage.levelId) {
      byLevelId.set(stage.levelId.toLowerCase(), stage);
    }
  });
  return { ok: true, value: { byStageId, byLevelId }, anomalies };
};

export const parseZoneTable = (document: unknown): ParseResult<ReadonlyMap<string, Zone>> => {
  const parsed = zoneTableSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  const zones = new Map<string, Zone>();
  const anomalies: IndexAnomaly[] = [];
  validEntries(parsed.data.zones, zoneEntrySchema, anomalies).forEach(([key, entry]) => {
    zones.set(key, {
      zoneId: entry.zoneID,
      type: entry.type,
      zoneNameFirst: entry.zoneNameFirst,
      zoneNameSecond: entry.zoneNameSecond
    });
  });
  return { ok: true, value: zones, anomalies };
};

/**
 * Joins zone -> activity id against the activity basic info table, keyed by zone id.
 */
export const parseActivityTable = (document: unknown): ParseResult<ReadonlyMap<string, Activity>> => {
  const parsed = activityTableSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  const anomalies: IndexAnomaly[] = [];
  const basicInfo = new Map(validEntries(parsed.data.basicInfo, activityEntrySchema, anomalies));
  const zoneToActivity = validEntries(parsed.data.zoneToActivity, z.string(), anomalies);
  const activities = new Map<string, Activity>();
  zoneToActivity.forEach(([zoneId, activityId]) => {
    const info = basicInfo.get(activityId);
    if (!info) {
      anomalies.push({ key: zoneId, reason: `no basic info for activity ${activityId}` });
      return;
    }
    activities.set(zoneId, { id: info.id, name: info.name, type: info.type });
  });
  return { ok: true, value: activities, anomalies };
};

/**
 * Only `<prefix>_<tier>_<shortId>` ids are operators; they are indexed by `shortId`.
 */
export const parseCharacterTable = (document: unknown): ParseResult<ReadonlyMap<string, Character>> => {
  const parsed = characterTableSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  const characters = new Map<string, Character>();
  const anomalies: IndexAnomaly[] = [];
  validEntries(parsed.data, characterEntrySchema, anomalies).forEach(([id, entry]) => {
    if (!id) {
      anomalies.push({ key: id, reason: 'empty character id' });
      return;
    }
    const segments = id.split('_');
    if (segments.length !== 3) {
      anomalies.push({ key: id, reason: `expected 3 id segments, found ${segments.length}` });
      return;
    }
    characters.set(segments[2], {
      id,
      name: entry.name,
      profession: entry.profession,
      rarity: entry.rarity
    });
  });
  return { ok: true, value: characters, anomalies };
};

export const parseTowerTable = (document: unknown): ParseResult<ReadonlyMap<string, Tower>> => {
  const parsed = towerTableSchema.safeParse(document);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }
  const towers = new Map<string, Tower>();
  const anomalies: IndexAnomaly[] = [];
  validEntries(parsed.data.towers, towerEntrySchema, anomalies).forEach(([key, entry]) => {
    towers.set(key, { id: entry.id, name: entry.name, subName: entry.subName });
  });
  return { ok: true, value: towers, anomalies };
};
