export type RecordKind = 'expense' | 'credit';

export type LedgerRecordAttributes = {
  id: number;
  date: string;
  amountMinor: number;
  category: string;
  subcategory: string;
  note: string;
};

export type LedgerRecordCreationAttributes = Omit<LedgerRecordAttributes, 'id' | 'subcategory' | 'note'> &
  Partial<Pick<LedgerRecordAttributes, 'subcategory' | 'note'>>;
