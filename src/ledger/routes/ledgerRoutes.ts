import express, { Request, Response, NextFunction, Router } from 'express';
import { param, validationResult } from 'express-validator';
import type { LedgerToolkit } from '../tools/ledgerTools.js';

const validateToolName = [
  param('name').matches(/^[a-z_]+$/).withMessage('Tool name must be lowercase letters and underscores'),
];

const validate = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({
      status: 'error',
      error: { kind: 'ValidationError', message: 'Invalid tool name', details: errors.array() },
    });
    return;
  }
  next();
};

export function createLedgerRouter(toolkit: LedgerToolkit): Router {
  const router: Router = express.Router();

  // Tool discovery
  router.get('/tools', (req: Request, res: Response) => {
    res.status(200).json({ tools: toolkit.list() });
  });

  // Invoke a tool with a JSON object of named arguments
  router.post('/tools/:name', validateToolName, validate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await toolkit.invoke(req.params.name, req.body);
      res.status(outcome.httpStatus).json(outcome.body);
    } catch (error) {
      next(error);
    }
  });

  // Read-only catalog resource
  router.get('/categories', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await toolkit.invoke('categories', {});
      res.status(outcome.httpStatus).json(outcome.body.status === 'ok' ? outcome.body.result : outcome.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
