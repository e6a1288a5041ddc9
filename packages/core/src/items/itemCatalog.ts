import { UnknownItemError } from '../errors';
import { isStatName, type StatEffects } from '../stats/types';
import { assertItemRecords } from './itemFormat';
import type { CooldownMap, Item, ItemCategory, ItemRecord } from './types';

const toTitle = (id: string): string => {
  return id
    .split(/[_-]+/)
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(' ');
};

const toItem = (record: ItemRecord): Item => {
  const effects: StatEffects = {};
  for (const [stat, delta] of Object.entries(record.effects)) {
    if (isStatName(stat)) {
      effects[stat] = delta;
    }
  }

  return Object.freeze({
    id: record.id,
    category: record.category,
    effects: Object.freeze(effects),
    cooldownS: record.cooldown_s,
    name: record.name ?? toTitle(record.id),
    description: record.description ?? '',
  });
};

export class ItemCatalog {
  private readonly items: ReadonlyMap<string, Item>;

  private constructor(items: Item[]) {
    this.items = new Map(items.map((item) => [item.id, item]));
  }

  /** Throws CatalogError when the source is malformed or repeats an id. */
  static load(source: unknown): ItemCatalog {
    const records = assertItemRecords(source);
    return new ItemCatalog(records.map(toItem));
  }

  get size(): number {
    return this.items.size;
  }

  has(itemId: string): boolean {
    return this.items.has(itemId);
  }

  get(itemId: string): Item {
    const item = this.items.get(itemId);
    if (!item) {
      throw new UnknownItemError(itemId);
    }
    return item;
  }

  list(category?: ItemCategory): Item[] {
    const all = [...this.items.values()];
    return category ? all.filter((item) => item.category === category) : all;
  }

  defaultFor(category: ItemCategory): Item | null {
    return this.list(category)[0] ?? null;
  }

  remainingCooldownMs(itemId: string, now: number, lastUsed: Readonly<CooldownMap>): number {
    const item = this.get(itemId);
    const usedAt = lastUsed[itemId];
    if (usedAt === undefined) return 0;
    return Math.max(0, usedAt + item.cooldownS * 1000 - now);
  }

  isReady(itemId: string, now: number, lastUsed: Readonly<CooldownMap>): boolean {
    return this.remainingCooldownMs(itemId, now, lastUsed) === 0;
  }
}
