import type { SubcategoryPolicy } from '../config/env.js';
import type { CategoryCatalog } from './catalog/categoryCatalog.js';
import { RecordService } from './services/recordService.js';
import { SummaryService } from './services/summaryService.js';
import { WriteLock } from './services/writeLock.js';
import type { LedgerDatabase } from './store/ledgerDatabase.js';
import { LedgerToolkit } from './tools/ledgerTools.js';

export type LedgerServices = {
  records: RecordService;
  summaries: SummaryService;
  toolkit: LedgerToolkit;
};

export type LedgerServiceOptions = {
  database: LedgerDatabase;
  catalog: CategoryCatalog;
  subcategoryPolicy: SubcategoryPolicy;
};

export function createLedgerServices({ database, catalog, subcategoryPolicy }: LedgerServiceOptions): LedgerServices {
  const records = new RecordService({ database, catalog, subcategoryPolicy, writeLock: new WriteLock() });
  const summaries = new SummaryService({ database, catalog });
  const toolkit = new LedgerToolkit({ records, summaries });
  return { records, summaries, toolkit };
}

export { createLedgerRouter } from './routes/ledgerRoutes.js';
export { loadCategoryCatalog, buildCategoryCatalog } from './catalog/categoryCatalog.js';
