import fs from 'fs';
import path from 'path';
import type { BindParams, Database, SqlValue } from 'sql.js';
import logger from '../../utils/logger.js';
import { StoreError } from '../../errors/LedgerError.js';

export type SqlRow = Record<string, SqlValue>;

export type RunResult = {
  changes: number;
  lastInsertId: number;
};

export type LedgerDatabaseOptions = {
  storage: string;
  logging?: boolean;
};

export const IN_MEMORY_STORAGE = ':memory:';

// Wraps one sql.js connection. sql.js keeps the whole database in memory, so
// `persist` writes a snapshot back to `storage` once a mutation has committed.
export class LedgerDatabase {
  private closed = false;

  constructor(
    private readonly db: Database,
    private readonly options: LedgerDatabaseOptions,
  ) {}

  get storage(): string {
    return this.options.storage;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  exec(sql: string): void {
    this.log(sql);
    this.connection().exec(sql);
  }

  all(sql: string, params: BindParams = []): SqlRow[] {
    this.log(sql);
    const statement = this.connection().prepare(sql);
    try {
      statement.bind(params);
      const rows: SqlRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  get(sql: string, params: BindParams = []): SqlRow | undefined {
    return this.all(sql, params)[0];
  }

  run(sql: string, params: BindParams = []): RunResult {
    this.log(sql);
    const db = this.connection();
    db.run(sql, params);
    const changes = db.getRowsModified();
    const row = this.get('SELECT last_insert_rowid() AS id');
    return { changes, lastInsertId: Number(row?.id ?? 0) };
  }

  transaction<T>(work: () => T): T {
    this.exec('BEGIN');
    try {
      const result = work();
      this.exec('COMMIT');
      return result;
    } catch (error) {
      if (this.isOpen) {
        this.exec('ROLLBACK');
      }
      throw error;
    }
  }

  async persist(): Promise<void> {
    const { storage } = this.options;
    if (storage === IN_MEMORY_STORAGE) {
      return;
    }
    const snapshot = this.connection().export();
    const tmpPath = `${storage}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(path.resolve(storage)), { recursive: true });
      await fs.promises.writeFile(tmpPath, snapshot);
      await fs.promises.rename(tmpPath, storage);
    } catch (error) {
      throw new StoreError(
        `Unable to write database to ${storage}: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private connection(): Database {
    if (this.closed) {
      throw new StoreError('Database is closed');
    }
    return this.db;
  }

  private log(sql: string): void {
    if (this.options.logging) {
      logger.debug(sql.replace(/\s+/g, ' ').trim());
    }
  }
}
