import { ValidationError, toLedgerError } from '../../errors/LedgerError.js';
import { RECORD_TABLES, RecordKind } from '../models/index.js';
import type { LedgerDatabase } from '../store/ledgerDatabase.js';
import { CategoryCatalog, hasCategory } from '../catalog/categoryCatalog.js';
import { fromMinorUnits } from '../utils/amount.js';
import { assertDateRange } from '../utils/date.js';

export type CategoryTotals = Record<string, number>;

export type SummaryServiceOptions = {
  database: LedgerDatabase;
  catalog: CategoryCatalog;
};

export class SummaryService {
  constructor(private readonly options: SummaryServiceOptions) {}

  // Sums run over integer minor units in SQL; categories without records are omitted.
  async summarize(kind: RecordKind, startDate: string, endDate: string, category?: string): Promise<CategoryTotals> {
    const range = assertDateRange(startDate, endDate);
    const filter = category?.trim() || undefined;
    if (filter !== undefined && !hasCategory(this.options.catalog, kind, filter)) {
      throw new ValidationError(`Unknown ${kind} category "${filter}"`);
    }

    const params = filter !== undefined ? [range.startDate, range.endDate, filter] : [range.startDate, range.endDate];
    const totals: CategoryTotals = {};
    try {
      const rows = this.options.database.all(
        `
          SELECT category, SUM(amount_minor) AS total_minor
          FROM ${RECORD_TABLES[kind]}
          WHERE date BETWEEN ? AND ?
          ${filter !== undefined ? 'AND category = ?' : ''}
          GROUP BY category
          ORDER BY category ASC
        `,
        params,
      );
      for (const row of rows) {
        totals[String(row.category)] = fromMinorUnits(Number(row.total_minor ?? 0));
      }
    } catch (error) {
      throw toLedgerError(error);
    }
    return totals;
  }
}
