// State blob (de)serialization. The whole store is one JSON document:
//   { "refs": { "ETH": { "rate": "1", "resolve_time": "2", "request_id": "3" } } }
// u64 fields are decimal strings so nothing is rounded through a JS number.
// Symbols are arbitrary strings ("__proto__" included), so the refs object is only
// ever built with Object.fromEntries and read back with Object.entries.

import { z } from 'zod';
import { formatIssues, u64String } from '../schemas/u64.ts';
import type { Refs } from '../types/oracle.ts';
import { type Result, err, ok } from './errors.ts';
import { ReferenceStore } from './store.ts';

const RateRecordSchema = z.object({
  rate: u64String,
  resolve_time: u64String,
  request_id: u64String,
});

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// z.record drops a "__proto__" key, so records are validated one by one below
const StateSchema = z.object({
  refs: z.custom<Record<string, unknown>>(isPlainObject, 'Expected an object of rate records'),
});

export type SerializedRateRecord = z.input<typeof RateRecordSchema>;

export function serializeRefs(refs: Refs): Record<string, SerializedRateRecord> {
  return Object.fromEntries(
    Array.from(refs, ([symbol, record]): [string, SerializedRateRecord] => [
      symbol,
      {
        rate: record.rate.toString(),
        resolve_time: record.resolve_time.toString(),
        request_id: record.request_id.toString(),
      },
    ]),
  );
}

export function encodeState(store: ReferenceStore): string {
  return JSON.stringify({ refs: serializeRefs(store.snapshot()) });
}

export function decodeState(blob: string): Result<ReferenceStore> {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    return err(
      'StateCorrupted',
      `state blob is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = StateSchema.safeParse(raw);
  if (!parsed.success) {
    return err('StateCorrupted', `state blob failed validation:\n${formatIssues(parsed.error)}`);
  }

  const refs: Refs = new Map();
  for (const [symbol, value] of Object.entries(parsed.data.refs)) {
    const record = RateRecordSchema.safeParse(value);
    if (!record.success) {
      return err(
        'StateCorrupted',
        `state blob failed validation:\n${formatIssues(record.error, ['refs', symbol])}`,
      );
    }
    refs.set(symbol, record.data);
  }
  return ok(new ReferenceStore(refs));
}
