import { describe, expect, it } from 'vitest';
import { CatalogError, UnknownItemError } from '../../errors';
import { ItemCatalog } from '../itemCatalog';
import { parseItemCatalogYaml } from '../itemFormat';

const records = [
  { id: 'kibble_small', category: 'food', effects: { hunger: 10 }, cooldown_s: 120 },
  { id: 'premium_food', category: 'food', effects: { hunger: 25, mood: 5 }, cooldown_s: 600 },
  { id: 'ball', category: 'play', effects: { mood: 15, energy: -5 }, cooldown_s: 300, name: 'Bouncy Ball' },
];

const catalogErrorFrom = (source: unknown): CatalogError => {
  try {
    ItemCatalog.load(source);
  } catch (error) {
    if (error instanceof CatalogError) return error;
    throw error;
  }
  throw new Error('expected a CatalogError');
};

describe('ItemCatalog', () => {
  it('loads records and fills display names', () => {
    const catalog = ItemCatalog.load(records);

    expect(catalog.size).toBe(3);
    expect(catalog.get('kibble_small')).toEqual({
      id: 'kibble_small',
      category: 'food',
      effects: { hunger: 10 },
      cooldownS: 120,
      name: 'Kibble Small',
      description: '',
    });
    expect(catalog.get('ball').name).toBe('Bouncy Ball');
    expect(catalog.list('food').map((item) => item.id)).toEqual(['kibble_small', 'premium_food']);
    expect(catalog.defaultFor('food')?.id).toBe('kibble_small');
    expect(catalog.defaultFor('clean')).toBeNull();
  });

  it('throws UnknownItemError for a missing id', () => {
    const catalog = ItemCatalog.load(records);

    expect(() => catalog.get('cake')).toThrow(UnknownItemError);
    expect(catalog.has('cake')).toBe(false);
  });

  it('rejects duplicate ids', () => {
    const error = catalogErrorFrom([...records, { id: 'ball', category: 'play', effects: {}, cooldown_s: 1 }]);

    expect(error.issues).toEqual([{ path: '/3/id', message: 'duplicate item id "ball"' }]);
  });

  it('rejects unknown stats and negative cooldowns', () => {
    expect(catalogErrorFrom([{ id: 'x', category: 'food', effects: { luck: 3 }, cooldown_s: 0 }]).issues.length).toBeGreaterThan(0);
    expect(catalogErrorFrom([{ id: 'x', category: 'food', effects: {}, cooldown_s: -1 }]).issues.length).toBeGreaterThan(0);
    expect(catalogErrorFrom([{ id: 'x', category: 'snacks', effects: {}, cooldown_s: 0 }]).issues.length).toBeGreaterThan(0);
    expect(catalogErrorFrom({ items: [] }).issues.length).toBeGreaterThan(0);
  });

  it('computes remaining cooldown from the last use', () => {
    const catalog = ItemCatalog.load(records);
    const lastUsed = { ball: 1_000 };

    expect(catalog.remainingCooldownMs('ball', 101_000, lastUsed)).toBe(200_000);
    expect(catalog.isReady('ball', 301_000, lastUsed)).toBe(true);
    expect(catalog.remainingCooldownMs('kibble_small', 5_000, lastUsed)).toBe(0);
  });
});

describe('parseItemCatalogYaml', () => {
  it('flattens categories into records', () => {
    const parsed = parseItemCatalogYaml(
      ['food:', '  kibble:', '    effects:', '      hunger: 15', '    cooldown_s: 300', 'care:', '  hug:', '    cooldown_s: 0'].join('\n')
    );

    expect(parsed).toEqual([
      { id: 'kibble', category: 'food', effects: { hunger: 15 }, cooldown_s: 300 },
      { id: 'hug', category: 'care', effects: {}, cooldown_s: 0 },
    ]);
  });

  it('rejects a category that is not a mapping', () => {
    expect(() => parseItemCatalogYaml('food: 3\n')).toThrow(
      new CatalogError([{ path: '/food', message: 'must be a mapping of item id to definition' }])
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseItemCatalogYaml('- 1\n- 2\n')).toThrow(CatalogError);
  });
});
