/**
 * Trading Server
 * Validates the environment, wires the pipeline, serves the API and runs the scheduler
 */

import { closeRedis, getRedisClient } from '@bracket-trader/shared';
import { createDatabasePool } from '../common/database';
import { errorMessage } from '../common/errors';
import { loadConfig } from '../config';
import { createTradingContext } from '../context';
import { API_PREFIX, createApp } from './app';
import { validateEnvironment } from './validateEnv';

async function start(): Promise<void> {
  try {
    validateEnvironment();
  } catch (error) {
    /* eslint-disable no-console */
    console.error('Environment validation failed:');
    console.error(errorMessage(error));
    /* eslint-enable no-console */
    process.exit(1);
  }

  const config = loadConfig();
  const pool = createDatabasePool(config.databaseUrl);
  const redis = getRedisClient(config.redisUrl);
  const ctx = createTradingContext(config, { pool, redis });

  await ctx.pairService.initializePairs(config.tradingPairs);
  await ctx.manager.restoreCorrelations();

  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    /* eslint-disable no-console */
    console.log(`Trading server listening on port ${config.port}`);
    console.log(`Environment: ${config.nodeEnv}, close mode: ${config.closeMode}`);
    console.log(`API base URL: http://localhost:${config.port}${API_PREFIX}`);
    /* eslint-enable no-console */
  });

  ctx.scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    // eslint-disable-next-line no-console
    console.log(`${signal} received, shutting down gracefully...`);

    // Let the running cycle finish so no bracket is left half-placed
    await ctx.scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool.end();
    await closeRedis();

    // eslint-disable-next-line no-console
    console.log('Server closed');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT']) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        // eslint-disable-next-line no-console
        console.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
    });
  }
}

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start server:', errorMessage(error));
  process.exit(1);
});
