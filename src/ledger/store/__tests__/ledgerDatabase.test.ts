import fs from 'fs';
import os from 'os';
import path from 'path';
import { StoreError } from '../../../errors/LedgerError';
import { createTestLedger, TestLedger } from '../../__fixtures__/testLedger';

describe('LedgerDatabase', () => {
  let workDir: string;
  const opened: TestLedger[] = [];

  const open = async (storage: string) => {
    const ledger = await createTestLedger('strict', storage);
    opened.push(ledger);
    return ledger;
  };

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-db-'));
  });

  afterEach(() => {
    opened.splice(0).forEach((ledger) => ledger.database.close());
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('writes committed records to the storage file and reloads them', async () => {
    const storage = path.join(workDir, 'ledger.sqlite');
    const first = await open(storage);
    await first.records.add('expense', { date: '2024-01-15', amount: 45.99, category: 'food', note: 'Lunch' });
    const second = await first.records.add('expense', { date: '2024-01-16', amount: 3, category: 'transport' });
    await first.records.delete('expense', second);
    first.database.close();

    expect(fs.existsSync(storage)).toBe(true);

    const reopened = await open(storage);
    await expect(reopened.records.getRange('expense', '2024-01-01', '2024-01-31')).resolves.toEqual([
      { id: 1, date: '2024-01-15', amount: 45.99, category: 'food', subcategory: '', note: 'Lunch' },
    ]);
    await expect(
      reopened.records.add('expense', { date: '2024-01-17', amount: 1, category: 'food' }),
    ).resolves.toBe(3);
  });

  it('leaves no file behind for in-memory storage', async () => {
    const ledger = await open(':memory:');
    await ledger.records.add('credit', { date: '2024-01-31', amount: 2500, category: 'salary' });
    expect(fs.readdirSync(workDir)).toEqual([]);
  });

  it('rolls back a transaction whose work throws', async () => {
    const ledger = await open(':memory:');
    expect(() =>
      ledger.database.transaction(() => {
        ledger.database.run("INSERT INTO credits (date, amount_minor, category) VALUES ('2024-01-01', 100, 'salary')");
        throw new Error('boom');
      }),
    ).toThrow('boom');
    await expect(ledger.records.count('credit')).resolves.toBe(0);
  });

  it('reports a storage file that cannot be written as a StoreError', async () => {
    const blocker = path.join(workDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const ledger = await open(path.join(blocker, 'ledger.sqlite'));

    const failure = ledger.records.add('expense', { date: '2024-01-15', amount: 1, category: 'food' });
    await expect(failure).rejects.toBeInstanceOf(StoreError);
    await expect(failure).rejects.toThrow(`Unable to write database to ${path.join(blocker, 'ledger.sqlite')}`);
  });

  it('refuses every call once closed', async () => {
    const ledger = await open(':memory:');
    ledger.database.close();

    expect(ledger.database.isOpen).toBe(false);
    expect(() => ledger.database.all('SELECT 1')).toThrow(new StoreError('Database is closed'));
    await expect(ledger.records.count('expense')).rejects.toThrow('Database is closed');
  });
});
