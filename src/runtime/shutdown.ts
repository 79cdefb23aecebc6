import { log } from '../utils/logger.ts';

export interface ShutdownDeps {
  server: {
    close(callback: (error?: Error) => void): unknown;
    closeIdleConnections?(): void;
  };
  queue: { close(): Promise<void> };
  redis: { quit(): Promise<unknown> };
  exit?: (code: number) => void;
  forceAfterMs?: number;
}

/**
 * Signal handler that drains the HTTP server, the invocation queue and Redis, then exits.
 * Only the first signal starts a shutdown; a stuck drain is cut off after `forceAfterMs`.
 */
export const createGracefulShutdown = ({
  server,
  queue,
  redis,
  exit = (code) => process.exit(code),
  forceAfterMs = 10_000,
}: ShutdownDeps): ((signal: string) => void) => {
  let shuttingDown = false;

  return (signal) => {
    if (shuttingDown) {
      log.warn(`Received ${signal} while already shutting down`);
      return;
    }
    shuttingDown = true;
    log.info(`Received ${signal}. Starting graceful shutdown...`);

    const force = setTimeout(() => {
      log.error(`Graceful shutdown did not finish within ${forceAfterMs}ms, forcing exit`);
      exit(1);
    }, forceAfterMs);
    force.unref();

    const finish = (code: number) => {
      clearTimeout(force);
      exit(code);
    };

    server.close(async (error) => {
      if (error) log.warn('HTTP server close reported an error:', error);
      log.info('HTTP server closed');
      try {
        await queue.close();
        await redis.quit();
        log.info('Redis connection closed');
        finish(0);
      } catch (shutdownError) {
        log.error('Error during shutdown:', shutdownError);
        finish(1);
      }
    });
    // keep-alive sockets would otherwise hold close() open
    server.closeIdleConnections?.();
  };
};
