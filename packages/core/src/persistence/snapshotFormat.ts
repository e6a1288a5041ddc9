import Ajv from 'ajv';
import { createDefaultSnapshot } from '../engine/petEngine';
import { SNAPSHOT_VERSION, type PetSnapshot } from '../engine/types';
import { isEventKind, type EventMeta, type PetEvent } from '../events/types';
import type { CooldownMap } from '../items/types';
import { clampStat } from '../stats/statSet';
import { DEFAULT_STATS, STAT_NAMES, type PetStats, type StatName } from '../stats/types';

export interface SaveEventRecord {
  ts: string;
  kind: string;
  meta?: EventMeta;
}

/** On-disk layout. Every field but `version` may be absent and takes its default. */
export interface PetSaveDocument {
  version: number;
  created_at?: string;
  updated_at?: string;
  last_tick_at?: string;
  total_play_time_s?: number;
  stats?: Partial<Record<StatName, number>> & { sleeping?: boolean };
  item_cooldowns?: Record<string, string>;
  events?: SaveEventRecord[];
}

const statProperties = Object.fromEntries(STAT_NAMES.map((stat) => [stat, { type: 'number' }]));

export const petSaveSchema = {
  type: 'object',
  required: ['version'],
  properties: {
    version: { type: 'integer', minimum: 1 },
    created_at: { type: 'string' },
    updated_at: { type: 'string' },
    last_tick_at: { type: 'string' },
    total_play_time_s: { type: 'number', minimum: 0 },
    stats: {
      type: 'object',
      properties: {
        ...statProperties,
        sleeping: { type: 'boolean' },
      },
    },
    item_cooldowns: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    events: {
      type: 'array',
      items: {
        type: 'object',
        required: ['ts', 'kind'],
        properties: {
          ts: { type: 'string' },
          kind: { type: 'string' },
          meta: {
            type: 'object',
            additionalProperties: { type: ['string', 'number', 'boolean', 'null'] },
          },
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validatePetSave = ajv.compile<PetSaveDocument>(petSaveSchema);

export type SaveParseResult =
  | { ok: true; snapshot: PetSnapshot }
  | { ok: false; reason: string };

const toIso = (timestamp: number): string => new Date(timestamp).toISOString();

export const toSaveDocument = (snapshot: PetSnapshot): PetSaveDocument => {
  const itemCooldowns: Record<string, string> = {};
  for (const [itemId, usedAt] of Object.entries(snapshot.itemCooldowns)) {
    itemCooldowns[itemId] = toIso(usedAt);
  }

  return {
    version: SNAPSHOT_VERSION,
    created_at: toIso(snapshot.createdAt),
    updated_at: toIso(snapshot.updatedAt),
    last_tick_at: toIso(snapshot.lastTickAt),
    total_play_time_s: snapshot.totalPlayTimeS,
    stats: { ...snapshot.stats },
    item_cooldowns: itemCooldowns,
    events: snapshot.events.map((event) => ({
      ts: toIso(event.ts),
      kind: event.kind,
      meta: { ...event.meta },
    })),
  };
};

const parseTime = (value: string | undefined, field: string): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${field} is not a valid timestamp`);
  }
  return parsed;
};

const toStats = (stored: PetSaveDocument['stats']): PetStats => {
  const stats: PetStats = { ...DEFAULT_STATS };
  for (const stat of STAT_NAMES) {
    const value = stored?.[stat];
    if (value !== undefined) {
      stats[stat] = clampStat(value);
    }
  }
  if (stored?.sleeping !== undefined) {
    stats.sleeping = stored.sleeping;
  }
  return stats;
};

export const fromSaveDocument = (document: PetSaveDocument, now: number): PetSnapshot => {
  const defaults = createDefaultSnapshot(now);
  const createdAt = parseTime(document.created_at, 'created_at') ?? defaults.createdAt;
  const updatedAt = parseTime(document.updated_at, 'updated_at') ?? createdAt;
  const lastTickAt = parseTime(document.last_tick_at, 'last_tick_at') ?? updatedAt;

  const itemCooldowns: CooldownMap = {};
  for (const [itemId, usedAt] of Object.entries(document.item_cooldowns ?? {})) {
    itemCooldowns[itemId] = parseTime(usedAt, `item_cooldowns.${itemId}`) ?? now;
  }

  const events: PetEvent[] = [];
  for (const [index, record] of (document.events ?? []).entries()) {
    // Kinds added by newer versions are skipped rather than rejected.
    if (!isEventKind(record.kind)) continue;
    events.push({
      ts: parseTime(record.ts, `events[${index}].ts`) ?? now,
      kind: record.kind,
      meta: { ...(record.meta ?? {}) },
    });
  }

  return {
    version: document.version,
    createdAt,
    updatedAt,
    lastTickAt,
    totalPlayTimeS: document.total_play_time_s ?? defaults.totalPlayTimeS,
    stats: toStats(document.stats),
    itemCooldowns,
    events,
  };
};

export const serializeSnapshot = (snapshot: PetSnapshot): string => {
  return `${JSON.stringify(toSaveDocument(snapshot), null, 2)}\n`;
};

export const parseSnapshot = (content: string, now: number): SaveParseResult => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'invalid JSON' };
  }

  if (!validatePetSave(parsed)) {
    const reason = (validatePetSave.errors ?? [])
      .map((error) => `${error.instancePath || '/'} ${error.message ?? 'invalid value'}`)
      .join('; ');
    return { ok: false, reason: reason || 'invalid save document' };
  }

  try {
    return { ok: true, snapshot: fromSaveDocument(parsed, now) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'invalid save document' };
  }
};
