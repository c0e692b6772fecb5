import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import register from './metrics/metrics.js';
import instrumentMiddleware from './middleware/instrumentMiddleware.js';
import errorMiddleware from './middleware/errorMiddleware.js';
import { createLedgerRouter } from './ledger/index.js';
import type { LedgerToolkit } from './ledger/tools/ledgerTools.js';

export type AppOptions = {
  toolkit: LedgerToolkit;
  corsOrigins?: string[];
  rateLimitMax?: number;
};

export function createApp({ toolkit, corsOrigins = [], rateLimitMax = 1000 }: AppOptions): Express {
  const app = express();

  if (corsOrigins.length > 0) {
    app.use(
      cors({
        origin: corsOrigins,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
      })
    );
  }

  app.use(helmet());
  app.use(express.json());
  app.use(instrumentMiddleware);

  // API Requests limiter
  app.use(
    '/api/',
    rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: rateLimitMax,
      message: 'Too many requests from this IP, please try again after 15 minutes',
    })
  );

  app.use('/api', createLedgerRouter(toolkit));

  app.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', register.contentType);
      res.send(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.get('/', (req: Request, res: Response) => {
    res.send('Ledger Tools API');
  });

  app.use(errorMiddleware);

  return app;
}
