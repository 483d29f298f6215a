/**
 * Inbound session
 * The single incoming transfer: consent with auto-decline, progress and close
 */

import { randomUUID } from 'crypto';
import { TypedEmitter, Unsubscribe } from '../lib/emitter.lib';
import { Clock, EtaEstimator } from '../lib/eta.lib';
import { deviceName, isTextPayload, progressFraction } from '../lib/payload.lib';
import {
  InboundSessionSnapshot,
  ProtocolEvent,
  ProtocolState,
  TERMINAL_PROTOCOL_STATES,
  TransferAction,
  UserAction,
} from '../interfaces/transfer.interface';
import { ERROR_TYPES, TIMING } from '../utils/constants';
import { CoordinatorError } from '../utils/errors';
import { logger } from '../utils/logger';

export enum InboundOutcome {
  Finished = 'finished',
  CancelledByUser = 'cancelled-by-user',
  CancelledBySender = 'cancelled-by-sender',
  Disconnected = 'disconnected',
  Rejected = 'rejected',
  /** the engine stopped or restarted under the transfer */
  Interrupted = 'interrupted',
  Shutdown = 'shutdown',
}

export type ActionSource = 'user' | 'notification' | 'timeout';

export interface InboundSessionOptions {
  consentTimeoutMs?: number;
  clock?: Clock;
  notificationId?: string;
}

type InboundSessionEvents = {
  changed: [event: ProtocolEvent];
  'user-action': [action: UserAction, source: ActionSource];
  'timed-out': [];
  closed: [outcome: InboundOutcome];
};

export class InboundSession {
  readonly transferId: string;
  readonly notificationId: string;
  readonly eta: EtaEstimator;
  private lastEvent: ProtocolEvent;
  private action: UserAction | undefined;
  private cancelledByUser = false;
  private closed = false;
  private readonly autoDecline = new AbortController();
  private readonly consentTimeoutMs: number;
  private readonly events: TypedEmitter<InboundSessionEvents>;

  constructor(event: ProtocolEvent, options: InboundSessionOptions = {}) {
    this.transferId = event.id;
    this.notificationId = options.notificationId ?? randomUUID();
    this.lastEvent = event;
    this.consentTimeoutMs = options.consentTimeoutMs ?? TIMING.CONSENT_TIMEOUT_MS;
    this.eta = new EtaEstimator(event.metadata?.totalBytes ?? 0, options.clock);
    this.events = new TypedEmitter(`InboundSession(${event.id})`);
  }

  get event(): ProtocolEvent {
    return this.lastEvent;
  }

  get userAction(): UserAction | undefined {
    return this.action;
  }

  get userCancelled(): boolean {
    return this.cancelledByUser;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isAwaitingConsent(): boolean {
    return !this.closed && this.action === undefined;
  }

  get isAutoDeclineArmed(): boolean {
    return !this.autoDecline.signal.aborted;
  }

  get deviceName(): string {
    return deviceName(this.lastEvent);
  }

  get pinCode(): string | undefined {
    return this.lastEvent.metadata?.pinCode;
  }

  get progress(): number | undefined {
    if (this.lastEvent.state !== ProtocolState.ReceivingFiles) {
      return undefined;
    }
    return progressFraction(this.lastEvent.metadata);
  }

  onChanged(listener: (event: ProtocolEvent) => void): Unsubscribe {
    return this.events.on('changed', listener);
  }

  onUserAction(listener: (action: UserAction, source: ActionSource) => void): Unsubscribe {
    return this.events.on('user-action', listener);
  }

  onTimedOut(listener: () => void): Unsubscribe {
    return this.events.on('timed-out', listener);
  }

  onClosed(listener: (outcome: InboundOutcome) => void): Unsubscribe {
    return this.events.on('closed', listener);
  }

  /**
   * Start the consent timer. Whichever comes first wins: a user action or
   * close aborts the timer, an expired timer declines on the user's behalf.
   */
  armAutoDecline(): void {
    const { signal } = this.autoDecline;
    if (signal.aborted) {
      return;
    }

    const timer = setTimeout(() => {
      if (signal.aborted || this.action !== undefined) {
        return;
      }
      logger.info(`Consent for ${this.transferId} timed out, declining`);
      this.setUserAction(TransferAction.ConsentDecline, 'timeout');
      this.events.emit('timed-out');
    }, this.consentTimeoutMs);

    signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
  }

  cancelAutoDecline(): void {
    if (!this.autoDecline.signal.aborted) {
      this.autoDecline.abort();
    }
  }

  canApply(action: UserAction): boolean {
    if (this.closed) {
      return false;
    }
    if (action === TransferAction.TransferCancel) {
      return this.action === TransferAction.ConsentAccept;
    }
    return this.action === undefined;
  }

  setUserAction(action: UserAction, source: ActionSource = 'user'): void {
    if (!this.canApply(action)) {
      throw new CoordinatorError(
        ERROR_TYPES.INVALID_ACTION,
        `${action} is not valid for transfer ${this.transferId} (current: ${this.action ?? 'unset'})`
      );
    }

    this.cancelAutoDecline();
    this.action = action;
    if (action === TransferAction.TransferCancel) {
      this.cancelledByUser = true;
    }

    logger.debug(`Inbound ${this.transferId}: ${action} from ${source}`);
    this.events.emit('user-action', action, source);
  }

  /**
   * Apply an engine event for this transfer. Returns false for events of
   * another transfer or arriving after close.
   */
  applyEvent(event: ProtocolEvent): boolean {
    if (event.id !== this.transferId || this.closed) {
      return false;
    }

    const state = event.state ?? ProtocolState.Initial;
    if (state !== ProtocolState.WaitingForUserConsent) {
      this.cancelAutoDecline();
    }

    this.lastEvent = event;
    if (state === ProtocolState.ReceivingFiles && event.metadata && !isTextPayload(event)) {
      this.eta.stepWith(event.metadata.ackBytes);
    }
    this.events.emit('changed', event);

    if (TERMINAL_PROTOCOL_STATES.has(state)) {
      this.close(this.outcomeOf(state));
    }
    return true;
  }

  close(outcome: InboundOutcome): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.cancelAutoDecline();
    this.events.emit('closed', outcome);
  }

  dispose(): void {
    this.cancelAutoDecline();
    this.events.removeAllListeners();
  }

  snapshot(): InboundSessionSnapshot {
    const receivingFiles = this.lastEvent.state === ProtocolState.ReceivingFiles && !isTextPayload(this.lastEvent);
    const estimate = receivingFiles ? this.eta.estimate() : undefined;
    return {
      transferId: this.transferId,
      notificationId: this.notificationId,
      deviceName: this.deviceName,
      protocolState: this.lastEvent.state,
      userAction: this.action,
      userCancelled: this.cancelledByUser,
      closed: this.closed,
      progress: this.progress,
      speed: estimate?.speed,
      eta: estimate?.text,
    };
  }

  private outcomeOf(state: ProtocolState): InboundOutcome {
    switch (state) {
      case ProtocolState.Finished:
        return InboundOutcome.Finished;
      case ProtocolState.Cancelled:
        return this.cancelledByUser ? InboundOutcome.CancelledByUser : InboundOutcome.CancelledBySender;
      case ProtocolState.Rejected:
        return InboundOutcome.Rejected;
      default:
        return InboundOutcome.Disconnected;
    }
  }
}
