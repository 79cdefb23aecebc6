// Persistence port for the oracle state blob, plus its Redis implementation

export interface StateStorage {
  load(): Promise<string | null>;
  save(blob: string): Promise<void>;
}

// The slice of an ioredis client the storage needs; keyPrefix is applied by the client
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export class RedisStateStorage implements StateStorage {
  constructor(
    private redis: KeyValueClient,
    private stateKey: string,
  ) {}

  async load(): Promise<string | null> {
    return this.redis.get(this.stateKey);
  }

  async save(blob: string): Promise<void> {
    await this.redis.set(this.stateKey, blob);
  }
}
