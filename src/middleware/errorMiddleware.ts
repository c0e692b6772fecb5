import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger.js';
import { ValidationError, toLedgerError } from '../errors/LedgerError.js';

const isBodyParserFailure = (err: unknown): boolean =>
  err instanceof SyntaxError && 'status' in err && err.status === 400;

const errorMiddleware = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
  const failure = isBodyParserFailure(err) ? new ValidationError('Request body is not valid JSON') : toLedgerError(err);
  logger.error(`An error occurred: ${failure.message}`);

  res.status(failure.status).json({
    status: 'error',
    error: {
      kind: failure.kind,
      message: failure.message || 'An unexpected error occurred',
    },
  });
};

export default errorMiddleware;
