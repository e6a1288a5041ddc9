import {
  CooldownError,
  InvalidStateError,
  NotNeededError,
  UnknownItemError,
  type CommandError,
} from '../errors';
import { EventLog } from '../events/eventLog';
import { CHAT_CONTEXT_EVENTS, type EventKind, type EventMeta, type PetEvent } from '../events/types';
import type { ItemCatalog } from '../items/itemCatalog';
import type { CooldownMap, Item, ItemCategory } from '../items/types';
import type { PetAction, PetReply, ReplySource } from '../reply/responseContract';
import { defaultRandom } from '../stats/random';
import { StatSet, toFixedPoint } from '../stats/statSet';
import {
  DEFAULT_DECAY_RULES,
  DEFAULT_STATS,
  STAT_NAMES,
  type RandomSource,
  type StatEffects,
} from '../stats/types';
import {
  SNAPSHOT_VERSION,
  type CatchUpResult,
  type CommandResult,
  type EngineRules,
  type ItemCommandKind,
  type PetSnapshot,
  type PetStatusView,
} from './types';

const MINUTE_MS = 60_000;

export const DEFAULT_ENGINE_RULES: Readonly<EngineRules> = {
  ...DEFAULT_DECAY_RULES,
  maxCatchUpMinutes: 24 * 60,
  autoWakeEnergy: 95,
  healThreshold: 50,
  healItemId: 'medicine',
  vetItemId: 'vet_visit',
  petAffectionGain: 5,
  petMoodGain: 3,
  chatAffectionGain: 1,
  eventCapacity: 200,
};

const ITEM_COMMANDS = {
  FEED: { category: 'food', action: 'EAT' },
  CLEAN: { category: 'clean', action: 'CLEAN' },
  PLAY: { category: 'play', action: 'PLAY' },
} as const satisfies Record<ItemCommandKind, { category: ItemCategory; action: PetAction }>;

const CATEGORY_LABEL = {
  food: 'food',
  clean: 'cleaning',
  play: 'toy',
  care: 'care',
} as const satisfies Record<ItemCategory, string>;

export interface PetEngineOptions {
  catalog: ItemCatalog;
  snapshot?: PetSnapshot;
  rules?: Partial<EngineRules>;
  random?: RandomSource;
  clock?: () => number;
}

export const createDefaultSnapshot = (now: number): PetSnapshot => ({
  version: SNAPSHOT_VERSION,
  createdAt: now,
  updatedAt: now,
  lastTickAt: now,
  totalPlayTimeS: 0,
  stats: { ...DEFAULT_STATS },
  itemCooldowns: {},
  events: [],
});

const effectsToMeta = (effects: StatEffects): EventMeta => {
  const meta: EventMeta = {};
  for (const stat of STAT_NAMES) {
    const value = effects[stat];
    if (value !== undefined && value !== 0) {
      meta[stat] = value;
    }
  }
  return meta;
};

const asCommandError = (error: unknown): CommandError => {
  if (
    error instanceof UnknownItemError ||
    error instanceof CooldownError ||
    error instanceof InvalidStateError ||
    error instanceof NotNeededError
  ) {
    return error;
  }
  throw error;
};

/**
 * Owns the live stats, cooldown clock and event history. Every mutation goes through here.
 * Command validation failures come back as `{ ok: false, error }`; anything else propagates.
 */
export class PetEngine {
  readonly catalog: ItemCatalog;
  readonly rules: Readonly<EngineRules>;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly stats: StatSet;
  private readonly events: EventLog;
  private cooldowns: CooldownMap;
  private readonly createdAt: number;
  private updatedAt: number;
  private lastTickAt: number;
  private totalPlayTimeS: number;

  constructor(options: PetEngineOptions) {
    this.catalog = options.catalog;
    this.rules = { ...DEFAULT_ENGINE_RULES, ...options.rules };
    this.random = options.random ?? defaultRandom;
    this.clock = options.clock ?? (() => Date.now());

    const snapshot = options.snapshot ?? createDefaultSnapshot(this.clock());
    this.stats = StatSet.fromSnapshot(snapshot.stats);
    this.events = EventLog.from(snapshot.events, this.rules.eventCapacity);
    this.cooldowns = { ...snapshot.itemCooldowns };
    this.createdAt = snapshot.createdAt;
    this.updatedAt = snapshot.updatedAt;
    this.lastTickAt = snapshot.lastTickAt;
    this.totalPlayTimeS = snapshot.totalPlayTimeS;
  }

  static fromSnapshot(snapshot: PetSnapshot, options: Omit<PetEngineOptions, 'snapshot'>): PetEngine {
    return new PetEngine({ ...options, snapshot });
  }

  get sleeping(): boolean {
    return this.stats.sleeping;
  }

  applyCommand(kind: ItemCommandKind, itemId?: string, now: number = this.clock()): CommandResult {
    const command = ITEM_COMMANDS[kind];
    try {
      if (kind === 'PLAY' && this.stats.sleeping) {
        throw new InvalidStateError('Cannot play while the pet is sleeping');
      }
      const item = this.resolveItem(command.category, itemId);
      return this.useItem(item, kind, command.action, now);
    } catch (error) {
      return { ok: false, error: asCommandError(error) };
    }
  }

  feed(itemId?: string, now?: number): CommandResult {
    return this.applyCommand('FEED', itemId, now);
  }

  clean(itemId?: string, now?: number): CommandResult {
    return this.applyCommand('CLEAN', itemId, now);
  }

  play(itemId?: string, now?: number): CommandResult {
    return this.applyCommand('PLAY', itemId, now);
  }

  sleep(on: boolean, now: number = this.clock()): CommandResult {
    if (on === this.stats.sleeping) {
      return {
        ok: false,
        error: new InvalidStateError(on ? 'The pet is already sleeping' : 'The pet is already awake'),
      };
    }

    this.stats.sleeping = on;
    const event = this.record(on ? 'SLEEP' : 'WAKE', { reason: 'command' }, now);
    return { ok: true, action: on ? 'SLEEPING' : 'WAVE', event, applied: {}, stats: this.stats.snapshot() };
  }

  pet(now: number = this.clock()): CommandResult {
    const applied = this.stats.applyEffects({
      affection: this.rules.petAffectionGain,
      mood: this.rules.petMoodGain,
    });
    const event = this.record('SYSTEM', { command: 'pet', ...effectsToMeta(applied) }, now);
    return { ok: true, action: 'HEART', event, applied, stats: this.stats.snapshot() };
  }

  heal(now: number = this.clock()): CommandResult {
    try {
      const health = this.stats.get('health');
      if (!this.stats.isCritical('health', this.rules.healThreshold)) {
        throw new NotNeededError(`Health is ${health}, healing is only needed below ${this.rules.healThreshold}`);
      }
      return this.useItem(this.catalog.get(this.rules.healItemId), 'HEAL', 'HEAL', now);
    } catch (error) {
      return { ok: false, error: asCommandError(error) };
    }
  }

  vet(now: number = this.clock()): CommandResult {
    try {
      return this.useItem(this.catalog.get(this.rules.vetItemId), 'VET', 'HEAL', now);
    } catch (error) {
      return { ok: false, error: asCommandError(error) };
    }
  }

  /**
   * Applies one decay tick per whole minute since the last tick, rolling sickness
   * independently for each minute, and records a single summary event.
   */
  runCatchUp(now: number = this.clock()): CatchUpResult {
    if (!Number.isFinite(now)) {
      return { minutes: 0, capped: false, sickCount: 0, woke: false, action: null, event: null };
    }
    if (now < this.lastTickAt) {
      this.lastTickAt = now;
    }

    const elapsedMinutes = Math.floor((now - this.lastTickAt) / MINUTE_MS);
    if (elapsedMinutes < 1) {
      return { minutes: 0, capped: false, sickCount: 0, woke: false, action: null, event: null };
    }

    const minutes = Math.min(elapsedMinutes, this.rules.maxCatchUpMinutes);
    const capped = minutes < elapsedMinutes;
    const before = this.stats.snapshot();
    let sickCount = 0;
    let woke = false;

    for (let minute = 0; minute < minutes; minute += 1) {
      const { sick } = this.stats.decayTick(!this.stats.sleeping, this.random, this.rules);
      if (sick) sickCount += 1;

      if (this.stats.sleeping && this.stats.get('energy') > this.rules.autoWakeEnergy) {
        this.stats.sleeping = false;
        woke = true;
      }
    }

    this.lastTickAt = capped ? now : this.lastTickAt + minutes * MINUTE_MS;
    this.totalPlayTimeS += minutes * 60;

    const after = this.stats.snapshot();
    const change: StatEffects = {};
    for (const stat of STAT_NAMES) {
      change[stat] = toFixedPoint(after[stat] - before[stat]);
    }

    const event = this.record('DECAY', { minutes, capped, sick: sickCount, ...effectsToMeta(change) }, now);
    if (woke) {
      this.record('WAKE', { reason: 'rested' }, now);
    }

    return {
      minutes,
      capped,
      sickCount,
      woke,
      action: sickCount > 0 ? 'SICK' : null,
      event,
    };
  }

  /** Appends the CHAT event for a reply the caller obtained. */
  recordChat(userText: string, reply: PetReply, source: ReplySource, now: number = this.clock()): PetEvent {
    const applied = this.stats.applyEffects({ affection: this.rules.chatAffectionGain });
    return this.record(
      'CHAT',
      {
        user: userText.trim().slice(0, 120),
        say: reply.say,
        action: reply.action,
        source,
        ...effectsToMeta(applied),
      },
      now
    );
  }

  recordSystem(meta: EventMeta, now: number = this.clock()): PetEvent {
    return this.record('SYSTEM', meta, now);
  }

  recentEvents(n: number = CHAT_CONTEXT_EVENTS): PetEvent[] {
    return this.events.recent(n);
  }

  status(now: number = this.clock()): PetStatusView {
    const cooldowns: PetStatusView['cooldowns'] = [];
    for (const itemId of Object.keys(this.cooldowns)) {
      if (!this.catalog.has(itemId)) continue;
      const remainingMs = this.catalog.remainingCooldownMs(itemId, now, this.cooldowns);
      if (remainingMs > 0) {
        cooldowns.push({ itemId, category: this.catalog.get(itemId).category, remainingMs });
      }
    }

    return {
      stats: this.stats.snapshot(),
      createdAt: this.createdAt,
      lastTickAt: this.lastTickAt,
      totalPlayTimeS: this.totalPlayTimeS,
      cooldowns,
      recentEvents: this.events.recent(CHAT_CONTEXT_EVENTS),
    };
  }

  /** Deep copy of the live state; safe to hand to an async writer. */
  toSnapshot(): PetSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      lastTickAt: this.lastTickAt,
      totalPlayTimeS: this.totalPlayTimeS,
      stats: this.stats.snapshot(),
      itemCooldowns: { ...this.cooldowns },
      events: this.events.toArray(),
    };
  }

  private resolveItem(category: ItemCategory, itemId?: string): Item {
    if (itemId === undefined || itemId.trim().length === 0) {
      const fallback = this.catalog.defaultFor(category);
      if (!fallback) {
        throw new UnknownItemError('', `No ${CATEGORY_LABEL[category]} items are available`);
      }
      return fallback;
    }

    const item = this.catalog.get(itemId.trim());
    if (item.category !== category) {
      throw new UnknownItemError(item.id, `${item.name} is not a ${CATEGORY_LABEL[category]} item`);
    }
    return item;
  }

  private useItem(item: Item, kind: EventKind, action: PetAction, now: number): CommandResult {
    const remainingMs = this.catalog.remainingCooldownMs(item.id, now, this.cooldowns);
    if (remainingMs > 0) {
      throw new CooldownError(item.id, remainingMs);
    }

    const applied = this.stats.applyEffects(item.effects);
    this.cooldowns = { ...this.cooldowns, [item.id]: now };
    const event = this.record(kind, { item: item.id, ...effectsToMeta(applied) }, now);
    return { ok: true, action, event, applied, stats: this.stats.snapshot() };
  }

  private record(kind: EventKind, meta: EventMeta, now: number): PetEvent {
    const event: PetEvent = { ts: now, kind, meta };
    this.events.append(event);
    this.updatedAt = now;
    return event;
  }
}
