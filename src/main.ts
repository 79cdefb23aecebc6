// imports
import dotenv from 'dotenv';
dotenv.config();

import { Redis } from 'ioredis';
import { createApp } from './app.ts';
import { loadConfig } from './config/load.ts';
import { RedisStateStorage } from './redis/state-storage.ts';
import { systemClock } from './runtime/clock.ts';
import { createGracefulShutdown } from './runtime/shutdown.ts';
import { InvocationQueue } from './services/invocationQueue.ts';
import { ReferenceOracle } from './services/referenceOracle.ts';
import { log } from './utils/logger.ts';

async function main() {
  // config path may be passed as the first non-flag argument
  const configArg = process.argv.slice(2).find((arg) => !arg.startsWith('--'));
  const appCfg = await loadConfig(configArg);

  // check for reset flag
  const reset = process.argv.includes('--reset-state');

  // ioredis auto-connects; keyPrefix namespaces the state key
  const redis = new Redis(appCfg.redisUrl, { keyPrefix: appCfg.keyPrefix });
  redis.on('error', (err) => {
    log.error('Redis connection error:', err);
    log.error('Are you sure you have redis running at your specified endpoint?');
    process.exit(1);
  });

  const oracle = new ReferenceOracle(new RedisStateStorage(redis, appCfg.stateKey));
  const queue = new InvocationQueue();

  if (reset) {
    log.warn(`[RESET] Clearing oracle state at "${appCfg.keyPrefix}${appCfg.stateKey}"`);
    await oracle.instantiate({ sender: 'bootstrap' });
  } else if (!(await oracle.isInitialized())) {
    log.info('No oracle state found, initializing an empty store');
    await oracle.instantiate({ sender: 'bootstrap' });
  }

  const app = createApp({ oracle, queue, clock: systemClock, relayers: appCfg.relayers });
  const server = app.listen(appCfg.port, () => {
    log.info(
      `Reference oracle listening on port ${appCfg.port} (relay ${appCfg.relayers.length ? 'restricted' : 'open'})`,
    );
  });

  const gracefulShutdown = createGracefulShutdown({ server, queue, redis });

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error) => {
  log.fatal('Failed to start reference oracle:', error);
  process.exit(1);
});
