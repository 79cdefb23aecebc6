import express, { type NextFunction, type Request, type Response } from 'express';
import type { Relayer } from './config/schema.ts';
import { relayerKeyMiddleware } from './middleware/relayerKey.ts';
import { type ApiDeps, createApiHandlers } from './routes/api.ts';
import { log } from './utils/logger.ts';

export interface AppDeps extends ApiDeps {
  relayers: Relayer[];
}

const statusOf = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : undefined;

export const createApp = (deps: AppDeps): express.Application => {
  const app = express();
  const handlers = createApiHandlers(deps);
  const requireRelayer = relayerKeyMiddleware(deps.relayers);

  app.use(express.json());
  app.post('/api/instantiate', requireRelayer, handlers.instantiate);
  app.post('/api/relay', requireRelayer, handlers.relay);
  app.get('/api/refs', handlers.refs);
  app.get('/api/reference-data', handlers.referenceData);
  app.post('/api/reference-data/bulk', handlers.referenceDataBulk);
  app.get('/health', handlers.health);

  // body-parser failures (malformed JSON, oversized body) surface here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error) ?? 500;
    if (status >= 400 && status < 500) {
      res.status(status).json({
        success: false,
        error: 'InvalidMessage',
        message: error instanceof Error ? error.message : 'Malformed request',
      });
      return;
    }
    log.error('Unhandled request error:', error);
    res.status(500).json({ success: false, error: 'Internal', message: 'Internal server error' });
  });

  return app;
};
