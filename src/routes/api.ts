import type { Request, Response } from 'express';
import { senderOf } from '../middleware/relayerKey.ts';
import type { OracleError, OracleErrorCode, Result } from '../oracle/errors.ts';
import { type Clock, currentEnv } from '../runtime/clock.ts';
import {
  decodeBulkReferenceQuery,
  decodeReferenceQuery,
  decodeRelayMsg,
} from '../schemas/messages.ts';
import type { InvocationQueue } from '../services/invocationQueue.ts';
import type { ReferenceOracle } from '../services/referenceOracle.ts';
import { toJsonSafe } from '../utils/bigint.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('api');

export interface ApiDeps {
  oracle: ReferenceOracle;
  queue: InvocationQueue;
  clock: Clock;
}

const STATUS_BY_CODE: Record<OracleErrorCode, number> = {
  InvalidMessage: 400,
  MismatchedBatchLength: 400,
  Unauthorized: 401,
  UnknownSymbol: 404,
  RefDataNotAvailable: 404,
  DivisionByZero: 422,
  StateNotInitialized: 503,
  StateCorrupted: 500,
};

export const statusFor = (error: OracleError): number => STATUS_BY_CODE[error.code];

const sendError = (res: Response, error: OracleError): void => {
  res.status(statusFor(error)).json({ success: false, error: error.code, message: error.message });
};

const sendInternalError = (res: Response, route: string, error: unknown): void => {
  logger.error(`${route} failed:`, error);
  res.status(500).json({
    success: false,
    error: 'Internal',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
};

// Unwraps a decoded message or answers 400 and returns null
const decoded = <T>(res: Response, result: Result<T>): T | null => {
  if (!result.ok) {
    sendError(res, result.error);
    return null;
  }
  return result.value;
};

export const createApiHandlers = ({ oracle, queue, clock }: ApiDeps) => ({
  /**
   * POST /api/instantiate - resets the store to empty
   */
  instantiate: async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await queue.run(() => oracle.instantiate({ sender: senderOf(res) }));
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ success: true });
    } catch (error) {
      sendInternalError(res, 'instantiate', error);
    }
  },

  /**
   * POST /api/relay - applies one batch of rate updates
   */
  relay: async (req: Request, res: Response): Promise<void> => {
    const msg = decoded(res, decodeRelayMsg(req.body));
    if (!msg) return;

    try {
      const result = await queue.run(() => oracle.relay(msg, { sender: senderOf(res) }));
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ success: true, symbolCount: result.value });
    } catch (error) {
      sendInternalError(res, 'relay', error);
    }
  },

  /**
   * GET /api/refs - full store snapshot
   */
  refs: async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await queue.run(() => oracle.getRefs());
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ refs: toJsonSafe(result.value) });
    } catch (error) {
      sendInternalError(res, 'refs', error);
    }
  },

  /**
   * GET /api/reference-data?base=ETH&quote=USD
   */
  referenceData: async (req: Request, res: Response): Promise<void> => {
    const query = decoded(res, decodeReferenceQuery(req.query));
    if (!query) return;

    try {
      const result = await queue.run(() => oracle.getReferenceData(query, currentEnv(clock)));
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json(toJsonSafe(result.value));
    } catch (error) {
      sendInternalError(res, 'reference-data', error);
    }
  },

  /**
   * POST /api/reference-data/bulk - { bases: [...], quotes: [...] }
   */
  referenceDataBulk: async (req: Request, res: Response): Promise<void> => {
    const query = decoded(res, decodeBulkReferenceQuery(req.body));
    if (!query) return;

    try {
      const result = await queue.run(() => oracle.getReferenceDataBulk(query, currentEnv(clock)));
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json(toJsonSafe(result.value));
    } catch (error) {
      sendInternalError(res, 'reference-data/bulk', error);
    }
  },

  /**
   * GET /health - Health check endpoint
   */
  health: (_req: Request, res: Response): void => {
    res.status(200).json({ status: 'UP', pendingInvocations: queue.pending });
  },
});
