// Public surface of the reference oracle

// Core
export { ReferenceStore } from './oracle/store.ts';
export { resolve, crossRate } from './oracle/resolver.ts';
export { encodeState, decodeState, serializeRefs } from './oracle/codec.ts';
export { OracleError, ok, err } from './oracle/errors.ts';
export type { OracleErrorCode, Result } from './oracle/errors.ts';

// Types
export type {
  RateRecord,
  Refs,
  ResolvedPair,
  ReferenceData,
  RelayMsg,
  ReferenceQuery,
  BulkReferenceQuery,
  MessageInfo,
  ExecEnv,
} from './types/oracle.ts';

// Services and ports
export { ReferenceOracle } from './services/referenceOracle.ts';
export { InvocationQueue } from './services/invocationQueue.ts';
export { RedisStateStorage } from './redis/state-storage.ts';
export type { StateStorage, KeyValueClient } from './redis/state-storage.ts';
export { systemClock, fixedClock } from './runtime/clock.ts';
export type { Clock } from './runtime/clock.ts';

// Host
export { createApp } from './app.ts';
export { loadConfig } from './config/load.ts';
export type { AppConfig } from './config/schema.ts';
export { ANCHOR_SYMBOL, ANCHOR_RATE, CROSS_RATE_SCALE } from './constants.ts';
