/**
 * Posts API Entry Point
 *
 * Boot sequence: configuration, logger, store, application, server.
 */

import { loadConfig } from './framework/config/config.ts';
import { Logger, setLogger } from './framework/telemetry/logger.ts';
import { toError } from './framework/api/errors.ts';
import { openPostStore } from './src/contexts/posts/infrastructure/mod.ts';
import { createPostsApp } from './src/app.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logger
  const logger = new Logger({
    level: config.get('logLevel'),
    format: config.get('logFormat'),
    context: { env: config.get('env') },
  });
  setLogger(logger);

  // 3. Open the store and make sure the schema exists
  const database = config.get('database');
  const store = await openPostStore(database);
  logger.info('Post store ready', { driver: database.driver });

  // 4. Application
  const app = createPostsApp({ store, config, logger });

  // 5. Shut down cleanly on signals
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    await app.stop();
    await store.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', toError(error));
        process.exitCode = 1;
      });
    });
  }

  // 6. Start server
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start posts API:', error);
  process.exit(1);
});
