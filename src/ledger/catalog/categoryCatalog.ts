import fs from 'fs';
import { StoreError } from '../../errors/LedgerError.js';
import type { RecordKind } from '../models/index.js';

export type CategoryMap = Readonly<Record<string, readonly string[]>>;

export type CategoryCatalog = Readonly<Record<RecordKind, CategoryMap>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function parseCategoryMap(raw: unknown, kind: RecordKind): CategoryMap {
  if (!isRecord(raw)) {
    throw new StoreError(`Category catalog is missing the "${kind}" section`);
  }
  const categories: Record<string, readonly string[]> = {};
  for (const [category, subcategories] of Object.entries(raw)) {
    if (category.trim() === '') {
      throw new StoreError(`Category catalog "${kind}" contains an empty category name`);
    }
    if (!Array.isArray(subcategories) || !subcategories.every((entry) => typeof entry === 'string')) {
      throw new StoreError(`Category "${category}" in "${kind}" must list its subcategories as strings`);
    }
    categories[category] = Object.freeze([...subcategories]);
  }
  return Object.freeze(categories);
}

export function buildCategoryCatalog(raw: unknown): CategoryCatalog {
  if (!isRecord(raw)) {
    throw new StoreError('Category catalog must be a JSON object');
  }
  return Object.freeze({
    expense: parseCategoryMap(raw.expense, 'expense'),
    credit: parseCategoryMap(raw.credit, 'credit'),
  });
}

export function loadCategoryCatalog(filePath: string): CategoryCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new StoreError(`Unable to read category catalog at ${filePath}: ${(error as Error).message}`, error);
  }
  return buildCategoryCatalog(raw);
}

export const hasCategory = (catalog: CategoryCatalog, kind: RecordKind, category: string): boolean =>
  Object.prototype.hasOwnProperty.call(catalog[kind], category);

export const hasSubcategory = (
  catalog: CategoryCatalog,
  kind: RecordKind,
  category: string,
  subcategory: string,
): boolean => hasCategory(catalog, kind, category) && catalog[kind][category].includes(subcategory);
