import { describe, it, expect, beforeEach } from 'vitest';
import { RedisStateStorage } from '../../redis/state-storage.ts';
import { ReferenceOracle } from '../../services/referenceOracle.ts';
import type { ExecEnv, MessageInfo } from '../../types/oracle.ts';
import { FakeRedis } from '../_utils/fakeRedis.ts';

const STATE_KEY = 'state';
const creator: MessageInfo = { sender: 'creator' };
const env: ExecEnv = { blockTimeNs: 1571797419879305533n };

describe('ReferenceOracle', () => {
  let redis: FakeRedis;
  let oracle: ReferenceOracle;

  beforeEach(async () => {
    redis = new FakeRedis();
    oracle = new ReferenceOracle(new RedisStateStorage(redis, STATE_KEY));
  });

  describe('before instantiate', () => {
    it('reports the store as uninitialized', async () => {
      expect(await oracle.isInitialized()).toBe(false);
    });

    it('rejects relays and queries with StateNotInitialized', async () => {
      const relayed = await oracle.relay(
        { symbols: ['ETH'], rates: [1n], resolve_times: [2n], request_ids: [3n] },
        creator,
      );
      const refs = await oracle.getRefs();
      const data = await oracle.getReferenceData({ base: 'USD', quote: 'USD' }, env);

      for (const result of [relayed, refs, data]) {
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.code).toBe('StateNotInitialized');
      }
      expect(redis.setCalls).toBe(0);
    });
  });

  describe('after instantiate', () => {
    beforeEach(async () => {
      await oracle.instantiate(creator);
    });

    it('starts with an empty store', async () => {
      expect(await oracle.isInitialized()).toBe(true);
      expect(redis.peek(STATE_KEY)).toBe('{"refs":{}}');

      const refs = await oracle.getRefs();
      expect(refs.ok && refs.value.size).toBe(0);
    });

    it('returns exactly the records of one relayed batch', async () => {
      await oracle.relay(
        { symbols: ['ETH', 'BAND'], rates: [1n, 100n], resolve_times: [2n, 200n], request_ids: [3n, 300n] },
        creator,
      );

      const refs = await oracle.getRefs();
      expect(refs.ok).toBe(true);
      if (!refs.ok) return;
      expect(Object.fromEntries(refs.value)).toEqual({
        ETH: { rate: 1n, resolve_time: 2n, request_id: 3n },
        BAND: { rate: 100n, resolve_time: 200n, request_id: 300n },
      });
    });

    it('replaces a symbol relayed twice', async () => {
      await oracle.relay({ symbols: ['MATIC'], rates: [12n], resolve_times: [124824n], request_ids: [69n] }, creator);
      await oracle.relay(
        { symbols: ['MATIC'], rates: [24n], resolve_times: [124824n], request_ids: [69n] },
        { sender: 'sender' },
      );

      const refs = await oracle.getRefs();
      expect(refs.ok && refs.value.get('MATIC')).toEqual({
        rate: 24n,
        resolve_time: 124824n,
        request_id: 69n,
      });
    });

    it('leaves the persisted blob untouched when a batch is misaligned', async () => {
      await oracle.relay({ symbols: ['ETH'], rates: [1n], resolve_times: [2n], request_ids: [3n] }, creator);
      const before = redis.peek(STATE_KEY);
      const writes = redis.setCalls;

      const result = await oracle.relay(
        { symbols: ['ETH', 'BTC'], rates: [5n, 6n], resolve_times: [7n], request_ids: [8n, 9n] },
        creator,
      );

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('MismatchedBatchLength');
      expect(redis.setCalls).toBe(writes);
      expect(redis.peek(STATE_KEY)).toBe(before);
    });

    it('answers the USD/MATIC reference query', async () => {
      await oracle.relay(
        { symbols: ['MATIC'], rates: [112n], resolve_times: [1625108298000000000n], request_ids: [124n] },
        creator,
      );

      expect(await oracle.getReferenceData({ base: 'USD', quote: 'MATIC' }, env)).toEqual({
        ok: true,
        value: {
          rate: 8928571428571428571428571n,
          last_updated_base: 1571797419879305533n,
          last_updated_quote: 1625108298000000000n,
        },
      });
    });

    it('does not write on queries', async () => {
      const writes = redis.setCalls;
      await oracle.getRefs();
      await oracle.getReferenceData({ base: 'USD', quote: 'NOPE' }, env);
      expect(redis.setCalls).toBe(writes);
    });

    it('surfaces UnknownSymbol for an unregistered quote', async () => {
      const result = await oracle.getReferenceData({ base: 'USD', quote: 'NOPE' }, env);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('UnknownSymbol');
    });

    it('resets the store on a second instantiate', async () => {
      await oracle.relay({ symbols: ['ETH'], rates: [1n], resolve_times: [2n], request_ids: [3n] }, creator);
      await oracle.instantiate(creator);

      expect(redis.peek(STATE_KEY)).toBe('{"refs":{}}');
    });

    it('reports a corrupted blob instead of throwing', async () => {
      redis.prime(STATE_KEY, 'not json');
      const result = await oracle.getRefs();
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('StateCorrupted');
    });

    it('persists and resolves a symbol named like an Object prototype key', async () => {
      const relayed = await oracle.relay(
        { symbols: ['__proto__', 'ETH'], rates: [5n, 6n], resolve_times: [7n, 8n], request_ids: [9n, 10n] },
        creator,
      );
      expect(relayed).toEqual({ ok: true, value: 2 });

      const refs = await oracle.getRefs();
      expect(refs.ok).toBe(true);
      if (!refs.ok) return;
      expect([...refs.value.keys()]).toEqual(['__proto__', 'ETH']);
      expect(refs.value.get('__proto__')).toEqual({ rate: 5n, resolve_time: 7n, request_id: 9n });

      const data = await oracle.getReferenceData({ base: '__proto__', quote: 'USD' }, env);
      expect(data).toEqual({
        ok: true,
        value: { rate: 5_000_000_000n, last_updated_base: 7n, last_updated_quote: env.blockTimeNs },
      });
    });
  });

  describe('getReferenceDataBulk', () => {
    beforeEach(async () => {
      await oracle.instantiate(creator);
      await oracle.relay(
        { symbols: ['ETH', 'BTC'], rates: [2000_000000000n, 40000_000000000n], resolve_times: [10n, 20n], request_ids: [1n, 2n] },
        creator,
      );
    });

    it('resolves every aligned pair in order', async () => {
      const result = await oracle.getReferenceDataBulk({ bases: ['BTC', 'ETH'], quotes: ['ETH', 'USD'] }, env);

      expect(result).toEqual({
        ok: true,
        value: [
          { rate: 20_000000000000000000n, last_updated_base: 20n, last_updated_quote: 10n },
          { rate: 2000_000000000000000000n, last_updated_base: 10n, last_updated_quote: env.blockTimeNs },
        ],
      });
    });

    it('rejects mismatched bases and quotes', async () => {
      const result = await oracle.getReferenceDataBulk({ bases: ['BTC', 'ETH'], quotes: ['USD'] }, env);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('MismatchedBatchLength');
    });

    it('fails the whole call on the first failing pair', async () => {
      const result = await oracle.getReferenceDataBulk({ bases: ['ETH', 'DOGE'], quotes: ['USD', 'USD'] }, env);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('no reference data registered for DOGE');
    });
  });
});
