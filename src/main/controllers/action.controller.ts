/**
 * Action Controller
 * Binds the inter-process action bus (notification buttons, file-manager
 * plugin) to the transfer coordinator
 */

import { EventEmitter } from 'events';
import { BoundedChannel } from '../lib/channel.lib';
import { TransferCoordinator } from '../services/transferCoordinator.service';
import { SchedulerKind, TaskSupervisor } from '../services/taskSupervisor.service';
import { DesktopLauncher } from '../interfaces/integration.interface';
import { BUS_ACTIONS, ENGINE } from '../utils/constants';
import { errorMessage } from '../utils/errors';
import { dedupeFilePaths } from '../utils/fileHelper';
import { logger } from '../utils/logger';

let actionBus: EventEmitter | null = null;
let sendFilesChannel: BoundedChannel<string[]> | null = null;
let supervisor: TaskSupervisor | null = null;
let selection: string[] = [];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Run an async handler, logging instead of throwing into the emitter
 */
function handle(action: string, task: () => Promise<void>): void {
  void task().catch((err: unknown) => {
    logger.error(`Failed to handle ${action}:`, errorMessage(err));
  });
}

/**
 * Files most recently handed over by the file-manager plugin
 */
export function getSelectedFiles(): string[] {
  return [...selection];
}

/**
 * Setup all action bus handlers
 */
export function setupActionHandlers(
  bus: EventEmitter,
  coordinator: TransferCoordinator,
  launcher?: DesktopLauncher
): void {
  cleanupActionHandlers();

  actionBus = bus;
  const channel = new BoundedChannel<string[]>(ENGINE.HANDOFF_CHANNEL_CAPACITY);
  sendFilesChannel = channel;
  supervisor = new TaskSupervisor();

  // Consent from the notification buttons
  bus.on(BUS_ACTIONS.CONSENT_ACCEPT, () => {
    handle(BUS_ACTIONS.CONSENT_ACCEPT, () => coordinator.respondToConsent(true, 'notification'));
  });

  bus.on(BUS_ACTIONS.CONSENT_DECLINE, () => {
    handle(BUS_ACTIONS.CONSENT_DECLINE, () => coordinator.respondToConsent(false, 'notification'));
  });

  // Cancel the transfer currently being received
  bus.on(BUS_ACTIONS.TRANSFER_CANCEL, () => {
    handle(BUS_ACTIONS.TRANSFER_CANCEL, async () => {
      const inbound = coordinator.inbound();
      if (!inbound || inbound.closed) {
        logger.warn('Transfer cancel requested but nothing is being received');
        return;
      }
      await coordinator.cancel(inbound.transferId, 'notification');
    });
  });

  bus.on(BUS_ACTIONS.OPEN_FOLDER, (target: unknown) => {
    handle(BUS_ACTIONS.OPEN_FOLDER, async () => {
      const folder = typeof target === 'string' ? target : coordinator.settings.downloadDir;
      if (!launcher) {
        logger.warn(`No desktop launcher to open ${folder}`);
        return;
      }
      await launcher.openFolder(folder);
    });
  });

  bus.on(BUS_ACTIONS.COPY_TEXT, (target: unknown) => {
    handle(BUS_ACTIONS.COPY_TEXT, async () => {
      if (typeof target !== 'string') {
        logger.warn('copy-text action without text');
        return;
      }
      if (!launcher) {
        logger.warn('No desktop launcher to copy text');
        return;
      }
      await launcher.copyText(target);
    });
  });

  // File-manager plugin hands over a list of paths to share
  bus.on(BUS_ACTIONS.SEND_FILES, (files: unknown) => {
    handle(BUS_ACTIONS.SEND_FILES, async () => {
      if (!isStringArray(files)) {
        logger.warn('send-files action expects a list of paths');
        return;
      }
      await channel.send(files);
    });
  });

  supervisor.spawn('send-files-receiver', SchedulerKind.Ui, async (signal) => {
    while (!signal.aborted) {
      const files = await channel.recv(signal);
      selection = dedupeFilePaths(files);
      logger.info(`Received ${selection.length} file(s) to share`);
      try {
        await coordinator.startDiscovery();
      } catch (err) {
        logger.warn('Discovery not started:', errorMessage(err));
      }
    }
  });

  logger.success('Action handlers registered successfully');
}

/**
 * Cleanup action bus handlers
 */
export function cleanupActionHandlers(): void {
  if (supervisor) {
    supervisor.stopAll();
    supervisor = null;
  }
  if (sendFilesChannel) {
    sendFilesChannel.close();
    sendFilesChannel = null;
  }
  if (actionBus) {
    const bus = actionBus;
    Object.values(BUS_ACTIONS).forEach((action) => {
      bus.removeAllListeners(action);
    });
    actionBus = null;
    logger.info('Action handlers cleaned up');
  }
  selection = [];
}
