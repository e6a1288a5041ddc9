import Ajv from 'ajv';
import { parse as parseYaml } from 'yaml';
import { CatalogError, type CatalogIssue } from '../errors';
import { STAT_NAMES } from '../stats/types';
import { ITEM_CATEGORIES, type ItemRecord } from './types';

export const itemRecordSchema = {
  type: 'object',
  additionalProperties: false,
  required: ['id', 'category', 'effects', 'cooldown_s'],
  properties: {
    id: { type: 'string', minLength: 1, pattern: '^[a-z0-9_-]+$' },
    category: { type: 'string', enum: [...ITEM_CATEGORIES] },
    effects: {
      type: 'object',
      propertyNames: { enum: [...STAT_NAMES] },
      additionalProperties: { type: 'number' },
    },
    cooldown_s: { type: 'integer', minimum: 0 },
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
  },
} as const;

export const itemCatalogSchema = {
  type: 'array',
  items: itemRecordSchema,
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateItemCatalog = ajv.compile<ItemRecord[]>(itemCatalogSchema);

const toIssues = (rawErrors: ReadonlyArray<{ instancePath?: string; message?: string }>): CatalogIssue[] => {
  return rawErrors.map((entry) => ({
    path: entry.instancePath && entry.instancePath.length > 0 ? entry.instancePath : '/',
    message: entry.message ?? 'invalid value',
  }));
};

const findDuplicates = (records: ReadonlyArray<ItemRecord>): CatalogIssue[] => {
  const seen = new Set<string>();
  const issues: CatalogIssue[] = [];
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      issues.push({ path: `/${index}/id`, message: `duplicate item id "${record.id}"` });
    }
    seen.add(record.id);
  });
  return issues;
};

/**
 * Structurally checks a raw catalog source. Throws CatalogError listing every problem found.
 */
export const assertItemRecords = (value: unknown): ItemRecord[] => {
  if (!validateItemCatalog(value)) {
    throw new CatalogError(
      toIssues(
        (validateItemCatalog.errors ?? []).map((error) => ({
          instancePath: error.instancePath,
          message: error.message,
        }))
      )
    );
  }

  const duplicates = findDuplicates(value);
  if (duplicates.length > 0) {
    throw new CatalogError(duplicates);
  }

  return value;
};

/**
 * Parses the YAML catalog layout: a mapping of category to a mapping of item id to definition.
 *
 *   food:
 *     kibble_small:
 *       effects: { hunger: 10 }
 *       cooldown_s: 300
 */
export const parseItemCatalogYaml = (content: string): ItemRecord[] => {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new CatalogError([
      { path: '/', message: error instanceof Error ? error.message : 'YAML parse error' },
    ]);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new CatalogError([{ path: '/', message: 'must be a mapping of category to items' }]);
  }

  const records: unknown[] = [];
  for (const [category, items] of Object.entries(parsed)) {
    if (!items || typeof items !== 'object' || Array.isArray(items)) {
      throw new CatalogError([{ path: `/${category}`, message: 'must be a mapping of item id to definition' }]);
    }
    for (const [id, definition] of Object.entries(items)) {
      const fields = definition && typeof definition === 'object' ? definition : {};
      records.push({ effects: {}, ...fields, id, category });
    }
  }

  return assertItemRecords(records);
};
