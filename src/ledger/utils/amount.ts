import { ValidationError } from '../../errors/LedgerError.js';

const MINOR_UNITS = 100;
const AMOUNT_PATTERN = /^(\d+)(?:\.(\d+))?$/;

// Parsed from the decimal text, never multiplied as a float: 45.99 -> 4599.
export function toMinorUnits(value: unknown, field = 'amount'): number {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number`);
    }
    text = String(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    throw new ValidationError(`${field} must be a number`);
  }

  if (text.startsWith('-')) {
    throw new ValidationError(`${field} must not be negative`);
  }

  const match = AMOUNT_PATTERN.exec(text.startsWith('+') ? text.slice(1) : text);
  if (!match) {
    throw new ValidationError(`${field} must be a decimal number, got "${text}"`);
  }

  const [, whole, fraction = ''] = match;
  if (fraction.length > 2 && !/^0+$/.test(fraction.slice(2))) {
    throw new ValidationError(`${field} supports at most two decimal places, got "${text}"`);
  }

  const cents = Number((fraction + '00').slice(0, 2));
  const minor = Number(whole) * MINOR_UNITS + cents;
  if (!Number.isSafeInteger(minor)) {
    throw new ValidationError(`${field} is too large`);
  }
  return minor;
}

export const fromMinorUnits = (minor: number): number => minor / MINOR_UNITS;
