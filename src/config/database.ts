import fs from 'fs';
import initSqlJs from 'sql.js';
import type { SqlJsStatic } from 'sql.js';
import logger from '../utils/logger.js';
import { LEDGER_SCHEMA } from '../ledger/models/index.js';
import { IN_MEMORY_STORAGE, LedgerDatabase, LedgerDatabaseOptions } from '../ledger/store/ledgerDatabase.js';

let sqlJs: Promise<SqlJsStatic> | null = null;

const loadSqlJs = (): Promise<SqlJsStatic> => {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
};

const readStorage = (storage: string): Uint8Array | null => {
  if (storage === IN_MEMORY_STORAGE || !fs.existsSync(storage)) {
    return null;
  }
  return fs.readFileSync(storage);
};

export async function openDatabase(options: LedgerDatabaseOptions): Promise<LedgerDatabase> {
  const SQL = await loadSqlJs();
  const existing = readStorage(options.storage);
  const database = new LedgerDatabase(new SQL.Database(existing), options);
  database.exec(LEDGER_SCHEMA);
  logger.info(
    `Database ready (sqlite storage=${options.storage}${existing ? `, ${existing.byteLength} bytes loaded` : ''})`,
  );
  return database;
}
