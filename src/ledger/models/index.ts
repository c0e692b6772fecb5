import { StoreError } from '../../errors/LedgerError.js';
import type { SqlRow } from '../store/ledgerDatabase.js';
import type { LedgerRecordAttributes, RecordKind } from './LedgerRecordAttributes.js';

export * from './LedgerRecordAttributes.js';

export const RECORD_TABLES: Record<RecordKind, string> = {
  expense: 'expenses',
  credit: 'credits',
};

export const RECORD_COLUMNS = 'id, date, amount_minor, category, subcategory, note';

const createTable = (table: string) => `
  CREATE TABLE IF NOT EXISTS ${table} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    amount_minor INTEGER NOT NULL,
    category TEXT NOT NULL,
    subcategory TEXT NOT NULL DEFAULT '',
    note TEXT NOT NULL DEFAULT ''
  );
  CREATE INDEX IF NOT EXISTS ${table}_date_id ON ${table} (date, id);
`;

export const LEDGER_SCHEMA = Object.values(RECORD_TABLES).map(createTable).join('\n');

const readInteger = (row: SqlRow, column: string): number => {
  const value = row[column];
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new StoreError(`Column ${column} holds a non-integer value`);
  }
  return value;
};

const readText = (row: SqlRow, column: string): string => {
  const value = row[column];
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new StoreError(`Column ${column} holds a non-text value`);
  }
  return value;
};

export const toRecordAttributes = (row: SqlRow): LedgerRecordAttributes => ({
  id: readInteger(row, 'id'),
  date: readText(row, 'date'),
  amountMinor: readInteger(row, 'amount_minor'),
  category: readText(row, 'category'),
  subcategory: readText(row, 'subcategory'),
  note: readText(row, 'note'),
});
