export type LedgerErrorKind = 'ValidationError' | 'NotFoundError' | 'StoreError';

export class LedgerError extends Error {
  kind: LedgerErrorKind;
  status: number;
  details?: unknown;

  constructor(kind: LedgerErrorKind, status: number, message: string, details?: unknown) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.status = status;
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ValidationError extends LedgerError {
  constructor(message: string, details?: unknown) {
    super('ValidationError', 400, message, details);
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('NotFoundError', 404, message);
  }
}

// Disk or SQL failure below the store.
export class StoreError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super('StoreError', 500, message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError;

export const toLedgerError = (error: unknown): LedgerError => {
  if (isLedgerError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StoreError(message, error);
};
