// Request decoding for the HTTP host: raw JSON / query strings → typed oracle messages

import { z } from 'zod';
import { type Result, err, ok } from '../oracle/errors.ts';
import type { BulkReferenceQuery, ReferenceQuery, RelayMsg } from '../types/oracle.ts';
import { formatIssues, u64Wire } from './u64.ts';

const SymbolName = z.string().min(1, 'symbol cannot be empty');

// Array lengths are deliberately not cross-checked here; the store rejects misaligned batches
export const RelayMsgSchema = z.object({
  symbols: z.array(SymbolName),
  rates: z.array(u64Wire),
  resolve_times: z.array(u64Wire),
  request_ids: z.array(u64Wire),
});

export const ReferenceQuerySchema = z.object({
  base: SymbolName,
  quote: SymbolName,
});

export const BulkReferenceQuerySchema = z.object({
  bases: z.array(SymbolName),
  quotes: z.array(SymbolName),
});

function decode<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): Result<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return err('InvalidMessage', `invalid ${what}:\n${formatIssues(parsed.error)}`);
  }
  return ok(parsed.data);
}

export const decodeRelayMsg = (input: unknown): Result<RelayMsg> =>
  decode(RelayMsgSchema, input, 'relay message');

export const decodeReferenceQuery = (input: unknown): Result<ReferenceQuery> =>
  decode(ReferenceQuerySchema, input, 'reference data query');

export const decodeBulkReferenceQuery = (input: unknown): Result<BulkReferenceQuery> =>
  decode(BulkReferenceQuerySchema, input, 'bulk reference data query');
