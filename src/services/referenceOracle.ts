import { decodeState, encodeState } from '../oracle/codec.ts';
import { type Result, err, ok } from '../oracle/errors.ts';
import { crossRate } from '../oracle/resolver.ts';
import { ReferenceStore } from '../oracle/store.ts';
import type { StateStorage } from '../redis/state-storage.ts';
import type {
  BulkReferenceQuery,
  ExecEnv,
  MessageInfo,
  ReferenceData,
  ReferenceQuery,
  Refs,
  RelayMsg,
} from '../types/oracle.ts';
import { log } from '../utils/logger.ts';

const logger = log.child('ReferenceOracle');

/**
 * Entry operations of the oracle.
 *
 * Every call loads the full store from `storage`, works on that snapshot and, for
 * writes, saves it back in one piece. Nothing is saved when a call fails. Callers
 * must not run two invocations against the same storage concurrently.
 */
export class ReferenceOracle {
  constructor(private storage: StateStorage) {}

  async isInitialized(): Promise<boolean> {
    return (await this.storage.load()) !== null;
  }

  async instantiate(info: MessageInfo): Promise<Result<void>> {
    await this.storage.save(encodeState(ReferenceStore.empty()));
    logger.info(`store initialized by ${info.sender}`);
    return ok(undefined);
  }

  async relay(msg: RelayMsg, info: MessageInfo): Promise<Result<number>> {
    const loaded = await this.loadStore();
    if (!loaded.ok) return loaded;

    const store = loaded.value;
    const applied = store.applyBatch(msg);
    if (!applied.ok) {
      logger.warn(`relay from ${info.sender} rejected: ${applied.error.code}`);
      return applied;
    }

    await this.storage.save(encodeState(store));
    logger.info(`relayed ${applied.value} rate(s) from ${info.sender}`, {
      symbols: msg.symbols,
      storeSize: store.size,
    });
    return applied;
  }

  async getRefs(): Promise<Result<Refs>> {
    const loaded = await this.loadStore();
    if (!loaded.ok) return loaded;
    return ok(loaded.value.snapshot());
  }

  async getReferenceData(query: ReferenceQuery, env: ExecEnv): Promise<Result<ReferenceData>> {
    const loaded = await this.loadStore();
    if (!loaded.ok) return loaded;

    const result = crossRate(loaded.value, query.base, query.quote, env.blockTimeNs);
    if (!result.ok) {
      logger.warn(`query ${query.base}/${query.quote} failed: ${result.error.code}`);
    }
    return result;
  }

  async getReferenceDataBulk(
    query: BulkReferenceQuery,
    env: ExecEnv,
  ): Promise<Result<ReferenceData[]>> {
    const { bases, quotes } = query;
    if (bases.length !== quotes.length) {
      return err(
        'MismatchedBatchLength',
        `bases and quotes differ in length: bases=${bases.length}, quotes=${quotes.length}`,
      );
    }

    const loaded = await this.loadStore();
    if (!loaded.ok) return loaded;

    const out: ReferenceData[] = [];
    for (let i = 0; i < bases.length; i++) {
      const result = crossRate(loaded.value, bases[i], quotes[i], env.blockTimeNs);
      if (!result.ok) {
        logger.warn(`bulk query ${bases[i]}/${quotes[i]} (index ${i}) failed: ${result.error.code}`);
        return result;
      }
      out.push(result.value);
    }
    return ok(out);
  }

  private async loadStore(): Promise<Result<ReferenceStore>> {
    const blob = await this.storage.load();
    if (blob === null) {
      return err('StateNotInitialized', 'oracle state has not been initialized');
    }
    logger.debug(`loaded state blob (${blob.length} bytes)`);
    return decodeState(blob);
  }
}
