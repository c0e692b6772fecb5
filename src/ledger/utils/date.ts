import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { ValidationError } from '../../errors/LedgerError.js';

dayjs.extend(customParseFormat);

const ISO_DATE_FORMAT = 'YYYY-MM-DD';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function assertIsoDate(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a date string in ${ISO_DATE_FORMAT} format`);
  }
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed) || !dayjs(trimmed, ISO_DATE_FORMAT, true).isValid()) {
    throw new ValidationError(`Invalid ${field} format. Expected ${ISO_DATE_FORMAT}, got: ${value}`);
  }
  return trimmed;
}

export function assertDateRange(startDate: unknown, endDate: unknown): { startDate: string; endDate: string } {
  const start = assertIsoDate(startDate, 'start_date');
  const end = assertIsoDate(endDate, 'end_date');
  if (start > end) {
    throw new ValidationError(`start_date ${start} is after end_date ${end}`);
  }
  return { startDate: start, endDate: end };
}
