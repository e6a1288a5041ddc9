import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { CatalogError, ItemCatalog, parseItemCatalogYaml } from '@pocket-pet/core';

export const DEFAULT_ITEMS_PATH = fileURLToPath(new URL('../../data/items.yaml', import.meta.url));

/** Reads the YAML catalog. A missing or malformed file is a CatalogError: the pet cannot run without items. */
export const loadItemCatalogFile = async (path: string = DEFAULT_ITEMS_PATH): Promise<ItemCatalog> => {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw new CatalogError([
      { path: '/', message: `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
  return ItemCatalog.load(parseItemCatalogYaml(content));
};
