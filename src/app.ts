import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './shared/config/env';
import { openDatabase, type SqliteDatabase } from './shared/database/connection';
import { logger } from './shared/logger';
import { systemClock, type Clock } from './shared/utils/time';
import { createServer } from './adapters/primary/http/server';
import { registerHealthRoutes } from './adapters/primary/http/routes/health.routes';
import { registerUserRoutes } from './adapters/primary/http/routes/user.routes';
import { registerAdminRoutes } from './adapters/primary/http/routes/admin.routes';
import { NotificationScheduler } from './adapters/primary/scheduler/NotificationScheduler';
import { TelegramDeliveryAdapter } from './adapters/secondary/delivery/TelegramDeliveryAdapter';
import { LoggingDeliverySink } from './adapters/secondary/delivery/LoggingDeliverySink';
import { SqliteUserRepository } from './modules/user/adapters/persistence/SqliteUserRepository';
import type { IDedupLedger } from './modules/notifications/application/ports/IDedupLedger';
import type { IDeliverySink } from './modules/notifications/application/ports/IDeliverySink';
import { SqliteDedupLedger } from './modules/notifications/adapters/persistence/SqliteDedupLedger';
import { InMemoryDedupLedger } from './modules/notifications/adapters/persistence/InMemoryDedupLedger';
import { RunNotificationTickUseCase } from './modules/notifications/application/use-cases/RunNotificationTickUseCase';
import { PruneDedupLedgerUseCase } from './modules/notifications/application/use-cases/PruneDedupLedgerUseCase';
import { EligibilityFilter } from './modules/notifications/domain/services/EligibilityFilter';
import { SlotTable } from './modules/notifications/domain/services/SlotTable';
import { MessageComposer } from './modules/notifications/domain/services/MessageComposer';
import { loadSlotTableConfig } from './modules/notifications/config/notification-slots';
import { schedulerConfigFrom } from './modules/notifications/config/scheduler-config';

/**
 * Replaceable collaborators, used by tests and scripts
 */
export interface ApplicationOverrides {
  db?: SqliteDatabase;
  deliverySink?: IDeliverySink;
  clock?: Clock;
}

export interface Application {
  server: FastifyInstance;
  scheduler: NotificationScheduler;
  runTick: RunNotificationTickUseCase;
  userRepository: SqliteUserRepository;
  /** Stops the scheduler, then the HTTP server, then closes the database */
  close(): Promise<void>;
}

function createDeliverySink(config: AppConfig): IDeliverySink {
  const { botToken, apiBaseUrl } = config.telegram;

  if (botToken === undefined) {
    logger.warn({
      msg: 'TELEGRAM_BOT_TOKEN not set, notifications will only be logged',
    });
    return new LoggingDeliverySink();
  }

  return new TelegramDeliveryAdapter({
    botToken,
    apiBaseUrl,
    timeoutMs: config.delivery.timeoutMs,
    retries: config.delivery.retries,
  });
}

function createLedger(config: AppConfig, db: SqliteDatabase): IDedupLedger {
  if (config.scheduler.dedupLedger === 'memory') {
    logger.warn({
      msg: 'Using in-memory dedup ledger, sent notifications are forgotten on restart',
    });
    return new InMemoryDedupLedger();
  }
  return new SqliteDedupLedger(db);
}

/**
 * Composition root
 *
 * Builds every adapter and use case from configuration and wires them into
 * the HTTP server and the notification scheduler. Nothing is started here.
 *
 * @throws InfrastructureError if the database cannot be opened
 */
export function createApplication(
  config: AppConfig,
  overrides: ApplicationOverrides = {}
): Application {
  const clock = overrides.clock ?? systemClock;
  const db = overrides.db ?? openDatabase(config.databasePath);

  const userRepository = new SqliteUserRepository(db);
  const ledger = createLedger(config, db);
  const deliverySink = overrides.deliverySink ?? createDeliverySink(config);
  const slotTable = new SlotTable(loadSlotTableConfig(config.scheduler.slotsFile));

  const runTick = new RunNotificationTickUseCase(
    userRepository,
    ledger,
    deliverySink,
    new EligibilityFilter(userRepository),
    slotTable,
    new MessageComposer(),
    schedulerConfigFrom(config),
    clock
  );

  const scheduler = new NotificationScheduler(runTick, new PruneDedupLedgerUseCase(ledger, clock), {
    tickIntervalMs: config.scheduler.tickIntervalMs,
    clock,
  });

  const server = createServer();

  registerHealthRoutes(server, { schedulerState: () => scheduler.currentState });
  registerUserRoutes(server, {
    userRepository,
    slotTable,
    trialDurationDays: config.trialDurationDays,
    clock,
  });

  if (config.adminApiToken !== undefined) {
    registerAdminRoutes(server, {
      userRepository,
      entitlementStore: userRepository,
      adminApiToken: config.adminApiToken,
      clock,
    });
  } else {
    logger.info({ msg: 'ADMIN_API_TOKEN not set, admin routes disabled' });
  }

  return {
    server,
    scheduler,
    runTick,
    userRepository,
    close: async (): Promise<void> => {
      await scheduler.stop();
      await server.close();
      db.close();
    },
  };
}
