import logger from '../../utils/logger.js';
import { NotFoundError, ValidationError, toLedgerError } from '../../errors/LedgerError.js';
import type { SubcategoryPolicy } from '../../config/env.js';
import {
  LedgerRecordAttributes,
  RECORD_COLUMNS,
  RECORD_TABLES,
  RecordKind,
  toRecordAttributes,
} from '../models/index.js';
import type { LedgerDatabase } from '../store/ledgerDatabase.js';
import { CategoryCatalog, hasCategory, hasSubcategory } from '../catalog/categoryCatalog.js';
import { fromMinorUnits, toMinorUnits } from '../utils/amount.js';
import { assertDateRange, assertIsoDate } from '../utils/date.js';
import { WriteLock } from './writeLock.js';

export type LedgerRecord = {
  id: number;
  date: string;
  amount: number;
  category: string;
  subcategory: string;
  note: string;
};

export type RecordInput = {
  date: string;
  amount: number | string;
  category: string;
  subcategory?: string;
  note?: string;
};

export type RecordChanges = Partial<RecordInput>;

export type RecordServiceOptions = {
  database: LedgerDatabase;
  catalog: CategoryCatalog;
  subcategoryPolicy: SubcategoryPolicy;
  writeLock?: WriteLock;
};

const KIND_LABELS: Record<RecordKind, string> = {
  expense: 'Expense',
  credit: 'Credit',
};

const toLedgerRecord = (row: LedgerRecordAttributes): LedgerRecord => ({
  id: row.id,
  date: row.date,
  amount: fromMinorUnits(row.amountMinor),
  category: row.category,
  subcategory: row.subcategory,
  note: row.note,
});

function assertRecordId(value: unknown): number {
  const id = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError('id must be a positive integer');
  }
  return id;
}

const assertText = (value: unknown, field: string): string => {
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
};

export class RecordService {
  private readonly writeLock: WriteLock;

  constructor(private readonly options: RecordServiceOptions) {
    this.writeLock = options.writeLock ?? new WriteLock();
  }

  get catalog(): CategoryCatalog {
    return this.options.catalog;
  }

  async add(kind: RecordKind, input: RecordInput): Promise<number> {
    const date = assertIsoDate(input.date, 'date');
    const amountMinor = toMinorUnits(input.amount);
    const category = this.assertCategory(kind, input.category);
    const subcategory = this.assertSubcategory(kind, category, input.subcategory ?? '');
    const note = assertText(input.note ?? '', 'note');

    return this.mutate((database) => {
      const { lastInsertId } = database.run(
        `INSERT INTO ${RECORD_TABLES[kind]} (date, amount_minor, category, subcategory, note) VALUES (?, ?, ?, ?, ?)`,
        [date, amountMinor, category, subcategory, note],
      );
      logger.info(`${KIND_LABELS[kind]} ${lastInsertId} created (${date} ${category})`);
      return lastInsertId;
    });
  }

  async getRange(kind: RecordKind, startDate: string, endDate: string): Promise<LedgerRecord[]> {
    const range = assertDateRange(startDate, endDate);
    try {
      const rows = this.options.database.all(
        `SELECT ${RECORD_COLUMNS} FROM ${RECORD_TABLES[kind]} WHERE date BETWEEN ? AND ? ORDER BY date ASC, id ASC`,
        [range.startDate, range.endDate],
      );
      return rows.map((row) => toLedgerRecord(toRecordAttributes(row)));
    } catch (error) {
      throw toLedgerError(error);
    }
  }

  async edit(kind: RecordKind, id: number, changes: RecordChanges): Promise<LedgerRecord> {
    const recordId = assertRecordId(id);
    const date = changes.date === undefined ? undefined : assertIsoDate(changes.date, 'date');
    const amountMinor = changes.amount === undefined ? undefined : toMinorUnits(changes.amount);
    const note = changes.note === undefined ? undefined : assertText(changes.note, 'note');
    const category = changes.category === undefined ? undefined : this.assertCategory(kind, changes.category);
    const subcategoryChange =
      changes.subcategory === undefined ? undefined : assertText(changes.subcategory, 'subcategory').trim();

    if ([date, amountMinor, note, category, subcategoryChange].every((value) => value === undefined)) {
      throw new ValidationError('No fields provided to update');
    }

    return this.mutate((database) => {
      const table = RECORD_TABLES[kind];
      const found = database.get(`SELECT ${RECORD_COLUMNS} FROM ${table} WHERE id = ?`, [recordId]);
      if (!found) {
        throw new NotFoundError(`${KIND_LABELS[kind]} ${recordId} not found`);
      }

      const row = toRecordAttributes(found);
      const nextCategory = category ?? row.category;
      const nextSubcategory =
        category !== undefined || subcategoryChange !== undefined
          ? this.assertSubcategory(kind, nextCategory, subcategoryChange ?? row.subcategory)
          : row.subcategory;

      const next: LedgerRecordAttributes = {
        id: row.id,
        date: date ?? row.date,
        amountMinor: amountMinor ?? row.amountMinor,
        category: nextCategory,
        subcategory: nextSubcategory,
        note: note ?? row.note,
      };
      database.run(
        `UPDATE ${table} SET date = ?, amount_minor = ?, category = ?, subcategory = ?, note = ? WHERE id = ?`,
        [next.date, next.amountMinor, next.category, next.subcategory, next.note, next.id],
      );
      logger.info(`${KIND_LABELS[kind]} ${recordId} updated`);
      return toLedgerRecord(next);
    });
  }

  async delete(kind: RecordKind, id: number): Promise<boolean> {
    const recordId = assertRecordId(id);
    return this.mutate((database) => {
      const { changes } = database.run(`DELETE FROM ${RECORD_TABLES[kind]} WHERE id = ?`, [recordId]);
      if (!changes) {
        throw new NotFoundError(`${KIND_LABELS[kind]} ${recordId} not found`);
      }
      logger.info(`${KIND_LABELS[kind]} ${recordId} deleted`);
      return true;
    });
  }

  async count(kind: RecordKind): Promise<number> {
    try {
      const row = this.options.database.get(`SELECT COUNT(*) AS total FROM ${RECORD_TABLES[kind]}`);
      return Number(row?.total ?? 0);
    } catch (error) {
      throw toLedgerError(error);
    }
  }

  // The snapshot is written while the lock is still held, so files land in commit order.
  private mutate<T>(work: (database: LedgerDatabase) => T): Promise<T> {
    const { database } = this.options;
    return this.writeLock.run(async () => {
      try {
        const result = database.transaction(() => work(database));
        await database.persist();
        return result;
      } catch (error) {
        throw toLedgerError(error);
      }
    });
  }

  private assertCategory(kind: RecordKind, value: unknown): string {
    const category = assertText(value, 'category').trim();
    if (category === '') {
      throw new ValidationError('category must not be empty');
    }
    if (!hasCategory(this.options.catalog, kind, category)) {
      throw new ValidationError(`Unknown ${kind} category "${category}"`, {
        allowed: Object.keys(this.options.catalog[kind]),
      });
    }
    return category;
  }

  private assertSubcategory(kind: RecordKind, category: string, value: unknown): string {
    const subcategory = assertText(value, 'subcategory').trim();
    if (subcategory === '' || this.options.subcategoryPolicy === 'free') {
      return subcategory;
    }
    if (!hasSubcategory(this.options.catalog, kind, category, subcategory)) {
      throw new ValidationError(`Unknown subcategory "${subcategory}" for ${kind} category "${category}"`, {
        allowed: this.options.catalog[kind][category],
      });
    }
    return subcategory;
  }
}
