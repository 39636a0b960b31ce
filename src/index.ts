import { createAdminCommands } from './bot/admin-commands.js';
import { createUserCommands } from './bot/commands.js';
import { createDispatcher } from './core/dispatcher.js';
import { createMaintenance } from './core/maintenance.js';
import { processInboundMessage } from './core/process-inbound-message.js';
import { createReplyCorrelator } from './core/reply-correlator.js';
import { createScheduler } from './core/scheduler.js';
import { BroadcastManager } from './features/broadcast.js';
import { createQuestionService } from './features/questions.js';
import { createSettingsService } from './features/settings.js';
import { loadTemplateCatalog } from './features/templates.js';
import { startHealthServer, stopHealthServer } from './middleware/health.js';
import { logger } from './middleware/logger.js';
import { createRateLimiter } from './middleware/rate-limit.js';
import { createPlatform } from './platforms/index.js';
import { loadConfig } from './utils/config.js';
import { openDb } from './utils/db.js';
import type { QuestionRecord, UserRecord } from './utils/db-types.js';
import { TtlCache } from './utils/ttl-cache.js';

type Shutdown = (signal: 'SIGINT' | 'SIGTERM') => Promise<void>;

let shutdownHandler: Shutdown | null = null;

async function main(): Promise<void> {
  logger.info('Nudge starting...');
  const config = loadConfig();

  logger.info({
    dbDialect: config.DB_DIALECT,
    tickSeconds: config.SCHEDULER_TICK_SECONDS,
    notificationTtlDays: config.NOTIFICATION_TTL_DAYS,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  const store = await openDb(config);

  const cacheOptions = { defaultTtlSeconds: config.CACHE_TTL_SECONDS, maxSize: config.CACHE_MAX_SIZE };
  const settingsCache = new TtlCache<UserRecord>(cacheOptions);
  const questionCache = new TtlCache<QuestionRecord[]>(cacheOptions);
  settingsCache.start();
  questionCache.start();

  const questions = createQuestionService(store, questionCache);
  const settings = createSettingsService(store, settingsCache, questions);
  const rateLimiter = createRateLimiter();
  const correlator = createReplyCorrelator(store, config.NOTIFICATION_TTL_DAYS);
  const platform = createPlatform(config);

  const dispatcher = createDispatcher({
    adapter: platform.adapter,
    correlator,
    sendTimeoutMs: config.SEND_TIMEOUT_MS,
    disableUnreachableUsers: config.DISABLE_UNREACHABLE_USERS,
    onUnreachableUser: async (userId) => {
      await settings.setEnabled(userId, false);
    },
  });

  const scheduler = createScheduler({
    store,
    questions,
    dispatcher,
    tickIntervalMs: config.SCHEDULER_TICK_SECONDS * 1000,
  });

  const broadcast = new BroadcastManager(store, dispatcher, {
    batchSize: config.BROADCAST_BATCH_SIZE,
    concurrency: config.BROADCAST_CONCURRENCY,
    batchDelayMs: config.BROADCAST_BATCH_DELAY_MS,
    pageSize: config.BROADCAST_PAGE_SIZE,
  });

  const admin = createAdminCommands({ adminId: config.ADMIN_USER_ID, broadcast, store });
  const commands = [
    ...createUserCommands({ settings, questions, store, templates: loadTemplateCatalog(), adminId: config.ADMIN_USER_ID }),
    ...admin.commands,
  ];

  const runtime = platform.createRuntime((inbound) =>
    processInboundMessage(inbound, {
      adapter: platform.adapter,
      rateLimiter,
      correlator,
      settings,
      store,
      commands,
      adminId: config.ADMIN_USER_ID,
    }),
  );

  const maintenance = createMaintenance({ store, questions, correlator, rateLimiter });

  startHealthServer(config.HEALTH_PORT, config.HEALTH_BIND_HOST);
  maintenance.start();
  scheduler.start();
  await runtime.start();

  shutdownHandler = async (signal) => {
    logger.info({ signal }, 'Received shutdown signal, shutting down');
    await scheduler.stop();
    maintenance.stop();
    await runtime.stop();
    if (broadcast.inProgress) logger.warn('Waiting for running broadcast to finish');
    await admin.whenIdle();
    stopHealthServer();
    settingsCache.stop();
    questionCache.stop();

    try {
      await store.close();
    } catch (err) {
      logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
    }
  };

  logger.info({ platform: runtime.platform }, 'Nudge is online and polling');
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fatal error, bot shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection, bot shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception, bot shutting down');
  process.exit(1);
});

async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  try {
    if (shutdownHandler) await shutdownHandler(signal);
  } catch (err) {
    logger.error({ err, signal }, 'Shutdown did not complete cleanly');
    process.exit(1);
  }
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
