// Symbol whose rate is hard-coded rather than relayed
export const ANCHOR_SYMBOL = 'USD';

// One unit of the anchor in the oracle's fixed-point base (1e9)
export const ANCHOR_RATE = 1_000_000_000n;

// Cross-rates are returned scaled by 1e18
export const CROSS_RATE_SCALE = 1_000_000_000_000_000_000n;

export const U64_MAX = (1n << 64n) - 1n;

export const DEFAULT_PORT = 8080;
export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_KEY_PREFIX = 'oracle:';
export const DEFAULT_STATE_KEY = 'state';
export const CONFIG_FILE_NAME = 'config.oracle.json';

export const ANONYMOUS_SENDER = 'anonymous';
