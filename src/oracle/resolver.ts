import { ANCHOR_RATE, ANCHOR_SYMBOL, CROSS_RATE_SCALE } from '../constants.ts';
import type { ReferenceData, ResolvedPair } from '../types/oracle.ts';
import { type Result, err, ok } from './errors.ts';
import type { ReferenceStore } from './store.ts';

/**
 * Resolves one symbol to its (rate, lastUpdate) pair.
 * The anchor never touches the store and is always fresh as of `nowNs`.
 */
export function resolve(store: ReferenceStore, symbol: string, nowNs: bigint): Result<ResolvedPair> {
  if (symbol === ANCHOR_SYMBOL) {
    return ok({ rate: ANCHOR_RATE, lastUpdate: nowNs });
  }

  const record = store.get(symbol);
  if (!record) {
    return err('UnknownSymbol', `no reference data registered for ${symbol}`);
  }
  if (record.resolve_time === 0n) {
    return err('RefDataNotAvailable', `reference data for ${symbol} has never been resolved`);
  }
  return ok({ rate: record.rate, lastUpdate: record.resolve_time });
}

/**
 * Price of `base` denominated in `quote`, scaled by 1e18 and truncated.
 */
export function crossRate(
  store: ReferenceStore,
  base: string,
  quote: string,
  nowNs: bigint,
): Result<ReferenceData> {
  const baseRes = resolve(store, base, nowNs);
  if (!baseRes.ok) return baseRes;
  const quoteRes = resolve(store, quote, nowNs);
  if (!quoteRes.ok) return quoteRes;

  if (quoteRes.value.rate === 0n) {
    return err('DivisionByZero', `quote ${quote} resolved to a zero rate`);
  }

  return ok({
    rate: (baseRes.value.rate * CROSS_RATE_SCALE) / quoteRes.value.rate,
    last_updated_base: baseRes.value.lastUpdate,
    last_updated_quote: quoteRes.value.lastUpdate,
  });
}
