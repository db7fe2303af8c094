import type { Server } from 'node:http';
import pino from 'pino';
import { loadConfig, type AppConfig } from './config/index.js';
import { createPool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { DetectionLoop, createPurchaseLimiter } from './services/acquisition/index.js';
import { safeNotify } from './services/acquisition/notify.js';
import { TelegramNotifier } from './services/notifications/index.js';
import { FileSnapshotStore, PgSnapshotStore, type SnapshotStore } from './services/snapshot/index.js';
import { TelegramGiftPlatform } from './services/telegram/index.js';
import { ConfigurationError, toErrorObject } from './utils/errors.js';

const logger = pino({ name: 'server' });

function fatal(err: unknown): never {
  logger.fatal({ err: toErrorObject(err) }, 'Unexpected error');
  process.exit(1);
}

process.on('uncaughtException', fatal);
process.on('unhandledRejection', fatal);

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal({ issues: err.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw err;
  }
}

async function boot(): Promise<void> {
  // Step 1: Config
  const config = readConfig();
  const { acquisition } = config;
  logger.info({ ranges: acquisition.ranges.length, env: config.nodeEnv }, 'Configuration validated');

  // Step 2: Snapshot store
  let store: SnapshotStore;
  let healthCheck: (() => Promise<unknown>) | undefined;
  const pool = config.databaseUrl ? createPool(config.databaseUrl) : null;
  if (config.databaseUrl && pool) {
    await runMigrations(config.databaseUrl);
    store = new PgSnapshotStore(pool);
    healthCheck = () => pool.query('SELECT 1');
  } else {
    store = new FileSnapshotStore(config.snapshotPath);
  }

  // Step 3: Collaborators
  const platform = new TelegramGiftPlatform(config.telegram.botToken);
  const notifier = new TelegramNotifier(config.telegram.botToken, config.telegram.notifyChatId);
  const limiter = createPurchaseLimiter(acquisition.purchaseSpacingMs);

  try {
    await platform.connect();
  } catch (err) {
    logger.warn({ err }, 'Initial connection failed, the first cycle will retry');
  }

  const loop = new DetectionLoop(
    {
      platform,
      notifier,
      limiter,
      store,
      rules: {
        ranges: acquisition.ranges,
        purchaseOnlyUpgradable: acquisition.purchaseOnlyUpgradable,
        prioritizeLowSupply: acquisition.prioritizeLowSupply,
      },
    },
    acquisition.pollIntervalMs,
  );

  // Step 4: Optional status surface
  let server: Server | null = null;
  if (config.port !== null) {
    const port = config.port;
    server = createApp({ loop, healthCheck }).listen(port, () => {
      logger.info(`Status server ready on port ${port}`);
    });
  }

  // Step 5: Run until a signal arrives
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await safeNotify(notifier, {
    type: 'engine_started',
    rangeCount: acquisition.ranges.length,
    pollIntervalMs: acquisition.pollIntervalMs,
  });

  await loop.run(controller.signal);

  server?.close();
  await limiter.stop({ dropWaitingJobs: true });
  await pool?.end();
  logger.info('Stopped');
}

boot()
  .then(() => process.exit(0))
  .catch(fatal);
