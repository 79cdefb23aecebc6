import type { Request, Response, NextFunction } from 'express';
import { ANONYMOUS_SENDER } from '../constants.ts';
import type { Relayer } from '../config/schema.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('auth');

/**
 * Resolves the relayer behind a write request. With no relayers configured the
 * relay is open and every caller is `anonymous`; otherwise `x-api-key` must match.
 */
export const relayerKeyMiddleware = (relayers: Relayer[]) => {
  const byKey = new Map(relayers.map((r) => [r.apiKey, r.name]));

  return (req: Request, res: Response, next: NextFunction): void => {
    if (byKey.size === 0) {
      res.locals.sender = ANONYMOUS_SENDER;
      next();
      return;
    }

    const apiKey = req.header('x-api-key');
    if (!apiKey) {
      res.status(401).json({ success: false, error: 'Unauthorized', message: 'API key is required' });
      return;
    }

    const name = byKey.get(apiKey);
    if (!name) {
      logger.warn(`rejected ${req.method} ${req.path} with unknown API key`);
      res.status(401).json({ success: false, error: 'Unauthorized', message: 'Invalid API key' });
      return;
    }

    res.locals.sender = name;
    next();
  };
};

export const senderOf = (res: Response): string => {
  const sender: unknown = res.locals.sender;
  return typeof sender === 'string' ? sender : ANONYMOUS_SENDER;
};
