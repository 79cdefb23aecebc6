import type { RateRecord, Refs, RelayMsg } from '../types/oracle.ts';
import { type Result, err, ok } from './errors.ts';

/**
 * In-memory view of the persisted symbol → RateRecord mapping.
 *
 * One instance lives for a single invocation: it is hydrated from the state blob,
 * mutated by at most one batch, and written back wholesale by the caller.
 */
export class ReferenceStore {
  private refs: Refs;

  constructor(refs?: Refs) {
    this.refs = new Map(refs ?? []);
  }

  static empty(): ReferenceStore {
    return new ReferenceStore();
  }

  /**
   * Upserts every aligned entry of the batch. Lengths are checked before any write,
   * so a rejected batch leaves the store untouched. Later duplicates win.
   */
  applyBatch(batch: RelayMsg): Result<number> {
    const { symbols, rates, resolve_times, request_ids } = batch;
    const len = symbols.length;
    if (rates.length !== len || resolve_times.length !== len || request_ids.length !== len) {
      return err(
        'MismatchedBatchLength',
        `batch arrays differ in length: symbols=${len}, rates=${rates.length}, ` +
          `resolve_times=${resolve_times.length}, request_ids=${request_ids.length}`,
      );
    }

    for (let i = 0; i < len; i++) {
      this.refs.set(symbols[i], {
        rate: rates[i],
        resolve_time: resolve_times[i],
        request_id: request_ids[i],
      });
    }
    return ok(len);
  }

  get(symbol: string): RateRecord | undefined {
    const record = this.refs.get(symbol);
    return record ? { ...record } : undefined;
  }

  get size(): number {
    return this.refs.size;
  }

  snapshot(): Refs {
    const copy: Refs = new Map();
    for (const [symbol, record] of this.refs) copy.set(symbol, { ...record });
    return copy;
  }
}
