// Core oracle types. Every u64 on the wire is a bigint here.

export interface RateRecord {
  rate: bigint;
  resolve_time: bigint; // ns; 0n = never resolved
  request_id: bigint; // audit only
}

export type Refs = Map<string, RateRecord>;

export interface ResolvedPair {
  rate: bigint;
  lastUpdate: bigint;
}

export interface ReferenceData {
  rate: bigint;
  last_updated_base: bigint;
  last_updated_quote: bigint;
}

export interface RelayMsg {
  symbols: string[];
  rates: bigint[];
  resolve_times: bigint[];
  request_ids: bigint[];
}

export interface ReferenceQuery {
  base: string;
  quote: string;
}

export interface BulkReferenceQuery {
  bases: string[];
  quotes: string[];
}

// Caller identity as supplied by the host; the core only logs it
export interface MessageInfo {
  sender: string;
}

// Execution context of a query: the instant the anchor resolves at
export interface ExecEnv {
  blockTimeNs: bigint;
}
