import { NotFoundError, ValidationError } from '../../../errors/LedgerError';
import { createTestLedger, TestLedger } from '../../__fixtures__/testLedger';
import { RecordService } from '../recordService';

describe('RecordService', () => {
  let ledger: TestLedger;

  beforeEach(async () => {
    ledger = await createTestLedger();
  });

  afterEach(() => {
    ledger.database.close();
  });

  describe('add', () => {
    it('assigns increasing identifiers per kind', async () => {
      const first = await ledger.records.add('expense', { date: '2024-01-15', amount: 45.99, category: 'food' });
      const second = await ledger.records.add('expense', { date: '2024-01-16', amount: 3, category: 'transport' });
      const credit = await ledger.records.add('credit', { date: '2024-01-31', amount: 2500, category: 'salary' });

      expect(first).toBe(1);
      expect(second).toBe(2);
      expect(credit).toBe(1);
    });

    it('defaults subcategory and note to empty strings', async () => {
      await ledger.records.add('expense', { date: '2024-01-15', amount: '10.50', category: 'food' });

      const [record] = await ledger.records.getRange('expense', '2024-01-01', '2024-01-31');
      expect(record).toEqual({
        id: 1,
        date: '2024-01-15',
        amount: 10.5,
        category: 'food',
        subcategory: '',
        note: '',
      });
    });

    it('allows zero amounts', async () => {
      const id = await ledger.records.add('expense', { date: '2024-01-15', amount: 0, category: 'food' });
      expect(id).toBe(1);
    });

    it('rejects unknown categories without writing anything', async () => {
      await expect(
        ledger.records.add('expense', { date: '2024-01-15', amount: 5, category: 'salary' }),
      ).rejects.toThrow('Unknown expense category "salary"');
      await expect(
        ledger.records.add('credit', { date: '2024-01-15', amount: 5, category: 'food' }),
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await ledger.records.count('expense')).toBe(0);
      expect(await ledger.records.count('credit')).toBe(0);
    });

    it('rejects negative amounts and malformed dates', async () => {
      await expect(
        ledger.records.add('expense', { date: '2024-01-15', amount: -1, category: 'food' }),
      ).rejects.toThrow('amount must not be negative');
      await expect(
        ledger.records.add('expense', { date: '2024-13-01', amount: 1, category: 'food' }),
      ).rejects.toThrow('Invalid date format');
      expect(await ledger.records.count('expense')).toBe(0);
    });

    it('validates subcategories against the catalog', async () => {
      await expect(
        ledger.records.add('expense', { date: '2024-01-15', amount: 5, category: 'food', subcategory: 'fuel' }),
      ).rejects.toThrow('Unknown subcategory "fuel" for expense category "food"');

      const id = await ledger.records.add('expense', {
        date: '2024-01-15',
        amount: 5,
        category: 'food',
        subcategory: 'groceries',
      });
      expect(id).toBe(1);
    });

    it('accepts arbitrary subcategories under the free policy', async () => {
      const freeRecords = new RecordService({
        database: ledger.database,
        catalog: ledger.catalog,
        subcategoryPolicy: 'free',
      });

      await freeRecords.add('expense', { date: '2024-01-15', amount: 5, category: 'food', subcategory: 'street food' });
      await expect(
        freeRecords.add('expense', { date: '2024-01-15', amount: 5, category: 'unknown' }),
      ).rejects.toThrow('Unknown expense category "unknown"');

      const [record] = await ledger.records.getRange('expense', '2024-01-15', '2024-01-15');
      expect(record.subcategory).toBe('street food');
    });
  });

  describe('getRange', () => {
    it('returns records inside the inclusive window ordered by date then id', async () => {
      await ledger.records.add('expense', { date: '2024-01-20', amount: 1, category: 'food' });
      await ledger.records.add('expense', { date: '2024-01-10', amount: 2, category: 'food' });
      await ledger.records.add('expense', { date: '2024-01-20', amount: 3, category: 'food' });
      await ledger.records.add('expense', { date: '2024-01-31', amount: 4, category: 'food' });
      await ledger.records.add('expense', { date: '2024-02-01', amount: 5, category: 'food' });
      await ledger.records.add('expense', { date: '2023-12-31', amount: 6, category: 'food' });

      const records = await ledger.records.getRange('expense', '2024-01-01', '2024-01-31');
      expect(records.map((record) => record.id)).toEqual([2, 1, 3, 4]);
    });

    it('keeps expenses and credits apart', async () => {
      await ledger.records.add('expense', { date: '2024-01-10', amount: 2, category: 'food' });
      await ledger.records.add('credit', { date: '2024-01-10', amount: 100, category: 'salary' });

      const credits = await ledger.records.getRange('credit', '2024-01-01', '2024-01-31');
      expect(credits).toHaveLength(1);
      expect(credits[0].category).toBe('salary');
    });

    it('rejects an inverted range', async () => {
      await expect(ledger.records.getRange('expense', '2024-02-01', '2024-01-01')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('edit', () => {
    it('changes only the supplied fields', async () => {
      const id = await ledger.records.add('expense', {
        date: '2024-01-15',
        amount: 45.99,
        category: 'food',
        subcategory: 'dining_out',
        note: 'Lunch',
      });

      const updated = await ledger.records.edit('expense', id, { amount: 55.99 });

      expect(updated).toEqual({
        id,
        date: '2024-01-15',
        amount: 55.99,
        category: 'food',
        subcategory: 'dining_out',
        note: 'Lunch',
      });
      expect(await ledger.records.getRange('expense', '2024-01-01', '2024-01-31')).toEqual([updated]);
    });

    it('can clear the subcategory and move the date', async () => {
      const id = await ledger.records.add('expense', {
        date: '2024-01-15',
        amount: 8,
        category: 'transport',
        subcategory: 'taxi',
      });

      const updated = await ledger.records.edit('expense', id, { date: '2024-02-03', subcategory: '' });
      expect(updated.date).toBe('2024-02-03');
      expect(updated.subcategory).toBe('');
      expect(await ledger.records.getRange('expense', '2024-01-01', '2024-01-31')).toEqual([]);
    });

    it('requires a subcategory that fits a new category', async () => {
      const id = await ledger.records.add('expense', {
        date: '2024-01-15',
        amount: 8,
        category: 'transport',
        subcategory: 'taxi',
      });

      await expect(ledger.records.edit('expense', id, { category: 'food' })).rejects.toThrow(
        'Unknown subcategory "taxi" for expense category "food"',
      );
      const moved = await ledger.records.edit('expense', id, { category: 'food', subcategory: 'dining_out' });
      expect(moved.category).toBe('food');
      expect(moved.subcategory).toBe('dining_out');
    });

    it('rejects unknown categories and leaves the record untouched', async () => {
      const id = await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      const [before] = await ledger.records.getRange('expense', '2024-01-15', '2024-01-15');

      await expect(ledger.records.edit('expense', id, { category: 'gadgets', amount: 1 })).rejects.toBeInstanceOf(
        ValidationError,
      );

      const [after] = await ledger.records.getRange('expense', '2024-01-15', '2024-01-15');
      expect(after).toEqual(before);
    });

    it('requires at least one field', async () => {
      const id = await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      await expect(ledger.records.edit('expense', id, {})).rejects.toThrow('No fields provided to update');
    });

    it('reports missing identifiers', async () => {
      await expect(ledger.records.edit('credit', 42, { note: 'x' })).rejects.toThrow('Credit 42 not found');
      await expect(ledger.records.edit('credit', 42, { note: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('removes the record from every later read', async () => {
      const id = await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      await ledger.records.add('expense', { date: '2024-01-16', amount: 9, category: 'food' });

      await expect(ledger.records.delete('expense', id)).resolves.toBe(true);

      const remaining = await ledger.records.getRange('expense', '2024-01-01', '2024-01-31');
      expect(remaining.map((record) => record.id)).toEqual([2]);
      await expect(ledger.records.delete('expense', id)).rejects.toThrow('Expense 1 not found');
    });

    it('never reuses a deleted identifier', async () => {
      await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      const second = await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      await ledger.records.delete('expense', second);

      const third = await ledger.records.add('expense', { date: '2024-01-15', amount: 8, category: 'food' });
      expect(third).toBe(3);
    });

    it('rejects identifiers that are not positive integers', async () => {
      await expect(ledger.records.delete('expense', 0)).rejects.toThrow('id must be a positive integer');
    });
  });

  it('serializes concurrent writes', async () => {
    const ids = await Promise.all(
      Array.from({ length: 10 }, (_, index) =>
        ledger.records.add('expense', { date: '2024-03-01', amount: index, category: 'food' }),
      ),
    );

    expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(await ledger.records.count('expense')).toBe(10);
  });
});
