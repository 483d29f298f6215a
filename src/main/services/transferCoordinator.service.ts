/**
 * Transfer Coordinator
 * Owns the protocol engine lifecycle, wires the relay loops to the router and
 * registries, and exposes the transfer operations to the presentation layer
 */

import { Mutex } from 'async-mutex';
import { BoundedChannel, Broadcaster, ChannelClosedError, ChannelLaggedError, Receiver } from '../lib/channel.lib';
import { TypedEmitter, Unsubscribe } from '../lib/emitter.lib';
import { Clock } from '../lib/eta.lib';
import { countOf, formatFileSize } from '../lib/format.lib';
import { formatEndpointAddress } from '../lib/network.lib';
import { payloadFiles } from '../lib/payload.lib';
import { ActionSource, InboundOutcome, InboundSession } from '../models/inboundSession.model';
import { TransferStore } from '../repository/transferRegistry.repository';
import { DiscoveryRegistry } from './discoveryRegistry.service';
import { EventRouter } from './eventRouter.service';
import { NotificationService } from './notification.service';
import { SchedulerKind, TaskSupervisor } from './taskSupervisor.service';
import { EngineMessage, EngineSettings, ProtocolEngine, SendRequest, Visibility } from '../interfaces/engine.interface';
import { NotificationSink, ToastMessage } from '../interfaces/integration.interface';
import {
  EndpointInfo,
  InboundSessionSnapshot,
  OutboundSessionSnapshot,
  SETTLED_OUTBOUND_STATES,
  TransferAction,
} from '../interfaces/transfer.interface';
import { BUS_ACTIONS, ENGINE, ERROR_TYPES, MESSAGES, TIMING } from '../utils/constants';
import { CoordinatorError, errorMessage } from '../utils/errors';
import { dedupeFilePaths, getTotalFileSize } from '../utils/fileHelper';
import { logger } from '../utils/logger';

export enum CoordinatorStatus {
  Stopped = 'stopped',
  Starting = 'starting',
  Running = 'running',
  Stopping = 'stopping',
  Unavailable = 'unavailable',
}

export type SettingsUpdate = Partial<Pick<EngineSettings, 'deviceName' | 'downloadDir' | 'staticPort'>>;

export interface CoordinatorOptions {
  settings: EngineSettings;
  consentTimeoutMs?: number;
  discoveryCapacity?: number;
  clock?: Clock;
  notifications?: NotificationSink;
  createNotificationId?: () => string;
  measureFiles?: (files: readonly string[]) => Promise<number>;
}

type CoordinatorEvents = {
  'service-status': [status: CoordinatorStatus];
  'recipients-changed': [recipients: OutboundSessionSnapshot[]];
  'outbound-changed': [session: OutboundSessionSnapshot];
  'inbound-request': [session: InboundSessionSnapshot];
  'inbound-changed': [session: InboundSessionSnapshot];
  'inbound-closed': [session: InboundSessionSnapshot, outcome: InboundOutcome];
  'visibility-changed': [visibility: Visibility];
  toast: [toast: ToastMessage];
};

export type CoordinatorEventName = keyof CoordinatorEvents;

export class TransferCoordinator {
  readonly store = new TransferStore();
  readonly discovery: DiscoveryRegistry;
  readonly router: EventRouter;
  readonly supervisor = new TaskSupervisor();

  private readonly events = new TypedEmitter<CoordinatorEvents>('TransferCoordinator');
  private readonly lifecycle = new Mutex();
  private readonly notifications: NotificationService | undefined;
  private readonly measureFiles: (files: readonly string[]) => Promise<number>;
  private readonly discoveryCapacity: number;
  private currentSettings: EngineSettings;
  private currentStatus = CoordinatorStatus.Stopped;
  private discoverySink: Broadcaster<EndpointInfo> | undefined;
  private discovering = false;
  private channelClosed = false;

  constructor(
    private readonly engine: ProtocolEngine,
    options: CoordinatorOptions
  ) {
    this.currentSettings = { ...options.settings };
    this.discoveryCapacity = options.discoveryCapacity ?? ENGINE.DISCOVERY_BROADCAST_CAPACITY;
    this.measureFiles = options.measureFiles ?? getTotalFileSize;
    this.notifications = options.notifications
      ? new NotificationService(options.notifications, () => this.currentSettings.downloadDir)
      : undefined;

    this.discovery = new DiscoveryRegistry(this.store, options.clock);
    this.router = new EventRouter(this.store, {
      consentTimeoutMs: options.consentTimeoutMs ?? TIMING.CONSENT_TIMEOUT_MS,
      clock: options.clock,
      createNotificationId: options.createNotificationId,
    });

    this.discovery.onRecipientsChanged((recipients) => {
      this.events.emit(
        'recipients-changed',
        recipients.map((session) => session.snapshot())
      );
    });
    this.router.onOutboundChanged((session) => this.events.emit('outbound-changed', session.snapshot()));
    this.router.onInboundCreated((session) => this.attachInbound(session));
    this.router.onInboundRefused((event) => {
      // The engine handles one transfer at a time
      this.engine.publish({ id: event.id, kind: 'lib', action: TransferAction.ConsentDecline });
    });
  }

  get status(): CoordinatorStatus {
    return this.currentStatus;
  }

  get settings(): EngineSettings {
    return { ...this.currentSettings };
  }

  get isDiscovering(): boolean {
    return this.discovering;
  }

  on<K extends CoordinatorEventName>(event: K, listener: (...args: CoordinatorEvents[K]) => void): Unsubscribe {
    return this.events.on(event, listener);
  }

  recipients(): OutboundSessionSnapshot[] {
    return this.store.outbound.snapshot();
  }

  inbound(): InboundSessionSnapshot | undefined {
    return this.store.inbound.snapshot();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  start(): Promise<void> {
    return this.lifecycle.runExclusive(() => this.startEngine());
  }

  stop(): Promise<void> {
    return this.lifecycle.runExclusive(() => this.stopEngine());
  }

  /**
   * Stop then start with the current settings, restoring discovery if it was on
   */
  restart(): Promise<void> {
    return this.lifecycle.runExclusive(async () => {
      const wasDiscovering = this.discovering;
      logger.loading('Restarting transfer engine...');
      await this.stopEngine();
      await this.startEngine();
      if (wasDiscovering) {
        this.beginDiscovery(true);
      }
    });
  }

  /**
   * Close the live inbound session, if any, and stop the engine
   */
  async shutdown(): Promise<void> {
    await this.store.inbound.evict(InboundOutcome.Shutdown);
    await this.stop();
    logger.info('Transfer coordinator shut down');
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  async send(endpointId: string, files: readonly string[]): Promise<OutboundSessionSnapshot> {
    await this.ensureRunning();

    const selection = dedupeFilePaths(files);
    if (selection.length === 0) {
      throw new CoordinatorError(ERROR_TYPES.INVALID_ACTION, 'No files selected to send');
    }
    const totalBytes = await this.measureFiles(selection);

    const { request, snapshot } = await this.store.outbound.withLock((view) => {
      const session = view.get(endpointId);
      if (!session) {
        throw new CoordinatorError(ERROR_TYPES.UNKNOWN_ENDPOINT, `Unknown endpoint ${endpointId}`);
      }
      if (!session.isPresent) {
        throw new CoordinatorError(
          ERROR_TYPES.ENDPOINT_UNAVAILABLE,
          `${session.deviceName} is no longer available`
        );
      }
      if (!session.canSend()) {
        throw new CoordinatorError(
          ERROR_TYPES.TRANSFER_ACTIVE,
          `A transfer to ${session.deviceName} is already ${session.transferState}`
        );
      }

      session.setFiles(selection, totalBytes);
      if (this.store.outbound.activeSession(session.id)) {
        session.markQueued();
      }

      const sendRequest: SendRequest = {
        id: session.id,
        name: session.deviceName,
        addr: formatEndpointAddress(session.endpoint),
        payload: { kind: 'files', files: [...selection] },
      };
      return { request: sendRequest, snapshot: session.snapshot() };
    });

    this.events.emit('outbound-changed', snapshot);
    logger.info(
      `Sending ${countOf(selection.length, 'file', 'files')} (${formatFileSize(totalBytes)}) to ${request.name} (${request.addr})`
    );

    try {
      await this.engine.send(request);
    } catch (err) {
      logger.error(`Failed to send to ${request.name}:`, errorMessage(err));
      throw err;
    }
    return snapshot;
  }

  async respondToConsent(accept: boolean, source: ActionSource = 'user'): Promise<void> {
    await this.ensureRunning();
    await this.store.inbound.withLock((session) => {
      if (!session || session.isClosed) {
        throw new CoordinatorError(ERROR_TYPES.NO_PENDING_REQUEST, 'No transfer request is waiting for consent');
      }
      session.setUserAction(accept ? TransferAction.ConsentAccept : TransferAction.ConsentDecline, source);
    });
  }

  async cancel(transferId: string, source: ActionSource = 'user'): Promise<void> {
    await this.ensureRunning();

    const cancelledInbound = await this.store.inbound.withLock((session) => {
      if (!session || session.isClosed || session.transferId !== transferId) {
        return false;
      }
      session.setUserAction(TransferAction.TransferCancel, source);
      return true;
    });
    if (cancelledInbound) {
      return;
    }

    await this.store.outbound.withLock((view) => {
      const session = view.get(transferId);
      if (!session) {
        throw new CoordinatorError(ERROR_TYPES.UNKNOWN_TRANSFER, `Unknown transfer ${transferId}`);
      }
      if (SETTLED_OUTBOUND_STATES.has(session.transferState)) {
        throw new CoordinatorError(
          ERROR_TYPES.INVALID_ACTION,
          `Transfer ${transferId} is ${session.transferState}, nothing to cancel`
        );
      }
      logger.info(`Cancelling transfer to ${session.deviceName}`);
      this.engine.publish({ id: transferId, kind: 'lib', action: TransferAction.TransferCancel });
    });
  }

  /**
   * Drop idle, failed and finished recipients and look for endpoints again.
   * Returns the ids removed.
   */
  async refreshRecipients(): Promise<string[]> {
    await this.ensureRunning();

    const removed = await this.store.outbound.removeWhere((session) =>
      SETTLED_OUTBOUND_STATES.has(session.transferState)
    );
    const ids = removed.map((session) => session.id);
    this.discovery.forget(ids);

    this.endDiscovery();
    this.beginDiscovery(true);
    logger.debug(`Refreshed recipients, removed ${ids.length}`);
    return ids;
  }

  async setVisibility(visible: boolean): Promise<void> {
    await this.ensureRunning();
    const visibility = visible ? Visibility.Visible : Visibility.Invisible;
    this.engine.setVisibility(visibility);
    this.currentSettings = { ...this.currentSettings, visibility };
  }

  /**
   * Apply new engine settings. Device name, download folder and port are
   * only read at engine start, so changing any of them restarts the engine.
   * Returns whether a restart happened.
   */
  async updateSettings(update: SettingsUpdate): Promise<boolean> {
    const current = this.currentSettings;
    const next: EngineSettings = { ...current, ...update };
    const needsRestart =
      next.deviceName !== current.deviceName ||
      next.downloadDir !== current.downloadDir ||
      next.staticPort !== current.staticPort;

    if (!needsRestart) {
      return false;
    }
    if (this.store.isEngineBusy()) {
      throw new CoordinatorError(
        ERROR_TYPES.TRANSFER_ACTIVE,
        "Settings can't be changed while a file is being sent"
      );
    }

    this.currentSettings = next;
    if (this.currentStatus === CoordinatorStatus.Stopped) {
      return false;
    }
    await this.restart();
    return true;
  }

  async startDiscovery(force?: boolean): Promise<boolean> {
    await this.ensureRunning();
    return this.beginDiscovery(force);
  }

  async stopDiscovery(): Promise<void> {
    await this.ensureRunning();
    this.endDiscovery();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private setStatus(status: CoordinatorStatus): void {
    if (this.currentStatus === status) {
      return;
    }
    this.currentStatus = status;
    this.events.emit('service-status', status);
  }

  /**
   * Wait out an in-flight start or restart, then require a running engine
   */
  private async ensureRunning(): Promise<void> {
    await this.lifecycle.waitForUnlock();
    if (this.channelClosed) {
      throw new CoordinatorError(ERROR_TYPES.CHANNEL_CLOSED, 'Engine channel closed, restart the transfer service');
    }
    if (this.currentStatus !== CoordinatorStatus.Running) {
      throw new CoordinatorError(ERROR_TYPES.ENGINE_UNAVAILABLE, `Transfer engine is ${this.currentStatus}`);
    }
  }

  private async startEngine(): Promise<void> {
    if (this.currentStatus === CoordinatorStatus.Running) {
      return;
    }
    if (this.channelClosed) {
      // Loops of the closed engine may still be alive
      await this.stopEngine();
    }

    this.setStatus(CoordinatorStatus.Starting);
    const settings = this.settings;
    logger.loading(`Starting transfer engine as "${settings.deviceName}"...`);

    try {
      await this.engine.start(settings);
    } catch (err) {
      this.setStatus(CoordinatorStatus.Unavailable);
      logger.error('Failed to start transfer engine:', errorMessage(err));
      throw new CoordinatorError(ERROR_TYPES.SERVICE_UNAVAILABLE, MESSAGES.SERVICE_UNAVAILABLE, { cause: err });
    }

    this.discoverySink = new Broadcaster<EndpointInfo>(this.discoveryCapacity);
    this.spawnEventLoops(this.engine.subscribe());
    this.spawnDiscoveryLoops(this.discoverySink.subscribe());
    this.spawnVisibilityWatcher(this.engine.watchVisibility());

    this.setStatus(CoordinatorStatus.Running);
    logger.success('Transfer engine started');
  }

  private async stopEngine(): Promise<void> {
    if (this.currentStatus === CoordinatorStatus.Stopped) {
      return;
    }

    this.setStatus(CoordinatorStatus.Stopping);
    const count = this.supervisor.stopAll();
    logger.info(`Cancelled ${countOf(count, 'looping task', 'looping tasks')}`);
    this.channelClosed = false;

    this.discoverySink?.close();
    this.discoverySink = undefined;
    this.discovering = false;

    // The engine will not report on transfers it was running
    const interrupted = await this.store.inbound.evict(InboundOutcome.Interrupted);
    if (interrupted) {
      logger.info(`Inbound transfer ${interrupted.transferId} interrupted`);
    }

    try {
      await this.engine.stop();
    } catch (err) {
      this.setStatus(CoordinatorStatus.Unavailable);
      logger.error('Failed to stop transfer engine:', errorMessage(err));
      throw new CoordinatorError(ERROR_TYPES.SERVICE_UNAVAILABLE, MESSAGES.SERVICE_UNAVAILABLE, { cause: err });
    }

    this.setStatus(CoordinatorStatus.Stopped);
    logger.info('Transfer engine stopped');
  }

  /**
   * Engine events: relay (runtime) -> bounded hand-off -> router (ui)
   */
  private spawnEventLoops(events: Receiver<EngineMessage>): void {
    const handoff = new BoundedChannel<EngineMessage>(ENGINE.HANDOFF_CHANNEL_CAPACITY);

    this.supervisor.spawn('engine-event-relay', SchedulerKind.Runtime, (signal) =>
      relay('engine event', events, handoff, signal)
    );

    this.supervisor.spawn('engine-event-forwarder', SchedulerKind.Ui, (signal) =>
      this.untilClosed('engine event', signal, async () => {
        while (!signal.aborted) {
          const message = await handoff.recv(signal);
          if (message.kind === 'client') {
            logger.debug(`Event ${message.event.state ?? 'Initial'} for ${message.id} (${message.event.direction})`);
          }
          try {
            await this.router.route(message);
          } catch (err) {
            logger.error(`Failed to apply event for ${message.id}:`, errorMessage(err));
          }
        }
      })
    );
  }

  /**
   * Discovered endpoints: relay (runtime) -> bounded hand-off -> registry (ui)
   */
  private spawnDiscoveryLoops(endpoints: Receiver<EndpointInfo>): void {
    const handoff = new BoundedChannel<EndpointInfo>(ENGINE.HANDOFF_CHANNEL_CAPACITY);

    this.supervisor.spawn('discovery-relay', SchedulerKind.Runtime, (signal) =>
      relay('discovery', endpoints, handoff, signal)
    );

    this.supervisor.spawn('discovery-forwarder', SchedulerKind.Ui, (signal) =>
      this.untilClosed('discovery', signal, async () => {
        while (!signal.aborted) {
          const endpoint = await handoff.recv(signal);
          await this.discovery.upsert(endpoint);
        }
      })
    );
  }

  private spawnVisibilityWatcher(visibility: Receiver<Visibility>): void {
    this.supervisor.spawn('visibility-watcher', SchedulerKind.Runtime, async (signal) => {
      try {
        while (!signal.aborted) {
          const value = await visibility.recv(signal);
          logger.info(`Device visibility is now ${value}`);
          this.currentSettings = { ...this.currentSettings, visibility: value };
          this.events.emit('visibility-changed', value);
        }
      } finally {
        visibility.close();
      }
    });
  }

  /**
   * Run a forwarding loop. A hand-off that closes while the loop was not
   * cancelled leaves the coordinator unavailable until restart.
   */
  private async untilClosed(label: string, signal: AbortSignal, loop: () => Promise<void>): Promise<void> {
    try {
      await loop();
    } catch (err) {
      if (!(err instanceof ChannelClosedError) || signal.aborted) {
        throw err;
      }
      logger.error(`The ${label} channel closed, transfer service unavailable until restart`);
      this.channelClosed = true;
      this.setStatus(CoordinatorStatus.Unavailable);
    }
  }

  private beginDiscovery(force?: boolean): boolean {
    const shouldStart = force ?? !this.discovering;
    if (!shouldStart) {
      return false;
    }

    const sink = this.discoverySink;
    if (!sink) {
      throw new CoordinatorError(ERROR_TYPES.ENGINE_UNAVAILABLE, 'Discovery is unavailable while the engine is stopped');
    }

    logger.info(`Starting discovery${force ? ' (forced)' : ''}`);
    this.engine.startDiscovery(sink);
    this.discovering = true;
    return true;
  }

  private endDiscovery(): void {
    if (!this.discovering) {
      return;
    }
    this.engine.stopDiscovery();
    this.discovering = false;
  }

  private attachInbound(session: InboundSession): void {
    const { notificationId } = session;
    const notifications = this.notifications;

    session.onUserAction((action) => {
      this.engine.publish({ id: session.transferId, kind: 'lib', action });
      if (action === TransferAction.ConsentAccept) {
        notifications?.receiving(notificationId, session.event);
      } else {
        notifications?.dismiss(notificationId);
      }
      this.events.emit('inbound-changed', session.snapshot());
    });

    session.onTimedOut(() => {
      this.events.emit('toast', { text: MESSAGES.REQUEST_TIMED_OUT });
    });

    session.onChanged(() => {
      this.events.emit('inbound-changed', session.snapshot());
    });

    session.onClosed((outcome) => {
      const event = session.event;
      switch (outcome) {
        case InboundOutcome.Finished: {
          notifications?.finished(notificationId, event);
          const files = payloadFiles(event);
          if (files) {
            this.events.emit('toast', {
              text: `${countOf(files.length, 'file', 'files')} received`,
              action: BUS_ACTIONS.OPEN_FOLDER,
            });
          }
          break;
        }
        case InboundOutcome.CancelledBySender:
          notifications?.cancelledBySender(notificationId, event);
          this.events.emit('toast', { text: MESSAGES.CANCELLED_BY_SENDER });
          break;
        case InboundOutcome.Disconnected:
          notifications?.disconnected(notificationId, event);
          this.events.emit('toast', { text: MESSAGES.UNEXPECTED_DISCONNECTION });
          break;
        default:
          notifications?.dismiss(notificationId);
          break;
      }
      this.events.emit('inbound-closed', session.snapshot(), outcome);
    });

    notifications?.incomingRequest(notificationId, session.event);
    this.events.emit('inbound-request', session.snapshot());
  }
}

/**
 * Forward values from an engine-side receiver into a bounded hand-off. A
 * lagging receiver is logged and keeps going; a closed one ends the relay
 * and closes the hand-off behind it.
 */
async function relay<T>(
  label: string,
  source: Receiver<T>,
  handoff: BoundedChannel<T>,
  signal: AbortSignal
): Promise<void> {
  try {
    while (!signal.aborted) {
      let value: T;
      try {
        value = await source.recv(signal);
      } catch (err) {
        if (err instanceof ChannelLaggedError) {
          logger.warn(`${label} relay lagged:`, err.message);
          continue;
        }
        if (err instanceof ChannelClosedError && !signal.aborted) {
          logger.warn(`${label} source closed`);
          return;
        }
        throw err;
      }
      await handoff.send(value, signal);
    }
  } finally {
    source.close();
    handoff.close();
  }
}
