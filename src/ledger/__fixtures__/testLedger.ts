import { openDatabase } from '../../config/database.js';
import type { SubcategoryPolicy } from '../../config/env.js';
import { buildCategoryCatalog, CategoryCatalog } from '../catalog/categoryCatalog.js';
import { createLedgerServices, LedgerServices } from '../index.js';
import { IN_MEMORY_STORAGE, LedgerDatabase } from '../store/ledgerDatabase.js';

export const TEST_CATALOG = {
  expense: {
    food: ['groceries', 'dining_out'],
    transport: ['fuel', 'taxi'],
    housing: ['rent'],
  },
  credit: {
    salary: ['monthly', 'bonus'],
    refund: ['tax_refund'],
  },
};

export type TestLedger = LedgerServices & {
  database: LedgerDatabase;
  catalog: CategoryCatalog;
};

export async function createTestLedger(
  subcategoryPolicy: SubcategoryPolicy = 'strict',
  storage: string = IN_MEMORY_STORAGE,
): Promise<TestLedger> {
  const database = await openDatabase({ storage });
  const catalog = buildCategoryCatalog(TEST_CATALOG);
  return { database, catalog, ...createLedgerServices({ database, catalog, subcategoryPolicy }) };
}
