import type { KeyValueClient } from '../../redis/state-storage.ts';

// In-process stand-in for the string commands the oracle issues against Redis
export class FakeRedis implements KeyValueClient {
  private kv = new Map<string, string>();
  public setCalls = 0;

  async get(k: string) {
    return this.kv.get(k) ?? null;
  }

  async set(k: string, v: string) {
    this.setCalls++;
    this.kv.set(k, v);
    return 'OK' as const;
  }

  // raw access for arranging state without counting as a write
  peek(k: string) {
    return this.kv.get(k);
  }

  prime(k: string, v: string) {
    this.kv.set(k, v);
  }

  clear() {
    this.kv.clear();
    this.setCalls = 0;
  }
}
