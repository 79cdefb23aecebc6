import type { ExecEnv } from '../types/oracle.ts';

export interface Clock {
  nowNs(): bigint;
}

// Wall clock has millisecond resolution; widen to nanoseconds to match relayed resolve times
export const systemClock: Clock = {
  nowNs: () => BigInt(Date.now()) * 1_000_000n,
};

export const fixedClock = (nowNs: bigint): Clock => ({ nowNs: () => nowNs });

export function currentEnv(clock: Clock): ExecEnv {
  return { blockTimeNs: clock.nowNs() };
}
