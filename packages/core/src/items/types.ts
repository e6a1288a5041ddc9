import type { StatEffects } from '../stats/types';

export const ITEM_CATEGORIES = ['food', 'clean', 'play', 'care'] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

export interface ItemRecord {
  id: string;
  category: ItemCategory;
  effects: Record<string, number>;
  cooldown_s: number;
  name?: string;
  description?: string;
}

export interface Item {
  readonly id: string;
  readonly category: ItemCategory;
  readonly effects: Readonly<StatEffects>;
  readonly cooldownS: number;
  readonly name: string;
  readonly description: string;
}

/** Item id to epoch milliseconds of the last use. */
export type CooldownMap = Record<string, number>;
