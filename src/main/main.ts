/**
 * Composition root
 * Builds the coordinator around a protocol engine, binds the action bus and
 * handles process shutdown
 */

import { EventEmitter } from 'events';
import { cleanupActionHandlers, setupActionHandlers } from './controllers/action.controller';
import { CoordinatorStatus, TransferCoordinator } from './services/transferCoordinator.service';
import { ProtocolEngine } from './interfaces/engine.interface';
import { DesktopLauncher, NotificationSink } from './interfaces/integration.interface';
import { APP_CONFIG, ENV, loadEngineSettings } from './utils/config';
import { errorMessage, isCoordinatorError } from './utils/errors';
import { logger } from './utils/logger';

export interface BootstrapOptions {
  bus?: EventEmitter;
  notifications?: NotificationSink;
  launcher?: DesktopLauncher;
  /** install SIGINT/SIGTERM handlers that shut the coordinator down */
  handleSignals?: boolean;
}

export interface App {
  coordinator: TransferCoordinator;
  bus: EventEmitter;
  shutdown(): Promise<void>;
}

/**
 * Start the transfer coordinator. A failed engine start leaves the
 * coordinator in the `unavailable` state so the user can retry.
 */
export async function bootstrap(engine: ProtocolEngine, options: BootstrapOptions = {}): Promise<App> {
  logger.setLevel(ENV.LOG_LEVEL);
  logger.info(`Starting ${APP_CONFIG.name} v${APP_CONFIG.version}`);

  const bus = options.bus ?? new EventEmitter();
  const coordinator = new TransferCoordinator(engine, {
    settings: loadEngineSettings(),
    consentTimeoutMs: APP_CONFIG.transfer.consentTimeoutMs,
    discoveryCapacity: APP_CONFIG.transfer.discoveryBroadcastCapacity,
    notifications: options.notifications,
  });

  setupActionHandlers(bus, coordinator, options.launcher);

  try {
    await coordinator.start();
  } catch (err) {
    if (!isCoordinatorError(err)) {
      throw err;
    }
    logger.warn('Transfer service unavailable:', errorMessage(err));
  }

  let closing: Promise<void> | undefined;
  let onSignal: ((signal: NodeJS.Signals) => void) | undefined;

  const shutdown = (): Promise<void> => {
    if (!closing) {
      if (onSignal) {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        onSignal = undefined;
      }
      closing = (async () => {
        logger.info('Application closing');
        cleanupActionHandlers();
        if (coordinator.status !== CoordinatorStatus.Stopped) {
          await coordinator.shutdown();
        }
      })();
    }
    return closing;
  };

  if (options.handleSignals) {
    onSignal = (signal: NodeJS.Signals) => {
      logger.info(`Received ${signal}`);
      shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Shutdown failed:', errorMessage(err));
          process.exit(1);
        });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  return { coordinator, bus, shutdown };
}

export { TransferCoordinator, CoordinatorStatus } from './services/transferCoordinator.service';
export { InboundOutcome } from './models/inboundSession.model';
export { CoordinatorError, isCoordinatorError } from './utils/errors';
export * from './interfaces/engine.interface';
export * from './interfaces/integration.interface';
export * from './interfaces/transfer.interface';
