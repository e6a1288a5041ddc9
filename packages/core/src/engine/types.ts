import type { CommandError } from '../errors';
import type { PetEvent } from '../events/types';
import type { CooldownMap, ItemCategory } from '../items/types';
import type { PetAction } from '../reply/responseContract';
import type { DecayRules, PetStats, StatEffects } from '../stats/types';

export const SNAPSHOT_VERSION = 1;

export type ItemCommandKind = 'FEED' | 'CLEAN' | 'PLAY';

export type TimeOfDay = 'morning' | 'day' | 'evening' | 'night';

export interface EngineRules extends DecayRules {
  maxCatchUpMinutes: number;
  /** A sleeping pet wakes once energy rises above this. */
  autoWakeEnergy: number;
  healThreshold: number;
  healItemId: string;
  vetItemId: string;
  petAffectionGain: number;
  petMoodGain: number;
  chatAffectionGain: number;
  eventCapacity: number;
}

/** Live engine state as plain data. Timestamps are epoch milliseconds. */
export interface PetSnapshot {
  version: number;
  createdAt: number;
  updatedAt: number;
  lastTickAt: number;
  totalPlayTimeS: number;
  stats: PetStats;
  itemCooldowns: CooldownMap;
  events: PetEvent[];
}

export type CommandResult =
  | {
      ok: true;
      action: PetAction;
      event: PetEvent;
      applied: StatEffects;
      stats: PetStats;
    }
  | {
      ok: false;
      error: CommandError;
    };

export interface CatchUpResult {
  minutes: number;
  capped: boolean;
  sickCount: number;
  woke: boolean;
  /** SICK when the pet fell ill during the run, otherwise null. */
  action: PetAction | null;
  event: PetEvent | null;
}

export interface PetStatusView {
  stats: PetStats;
  createdAt: number;
  lastTickAt: number;
  totalPlayTimeS: number;
  cooldowns: Array<{ itemId: string; category: ItemCategory; remainingMs: number }>;
  recentEvents: PetEvent[];
}
