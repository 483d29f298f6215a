/**
 * Event Router
 * Applies every engine message, in arrival order, to the session it belongs to
 */

import { TypedEmitter, Unsubscribe } from '../lib/emitter.lib';
import { Clock } from '../lib/eta.lib';
import { InboundSession } from '../models/inboundSession.model';
import { OutboundSession } from '../models/outboundSession.model';
import { TransferStore } from '../repository/transferRegistry.repository';
import { EngineMessage } from '../interfaces/engine.interface';
import { ProtocolEvent, ProtocolState, TransferDirection } from '../interfaces/transfer.interface';
import { logger } from '../utils/logger';

export enum RouteOutcome {
  Ignored = 'ignored',
  InboundCreated = 'inbound-created',
  InboundRefused = 'inbound-refused',
  InboundApplied = 'inbound-applied',
  InboundClosed = 'inbound-closed',
  InboundStale = 'inbound-stale',
  OutboundApplied = 'outbound-applied',
  OutboundUnknown = 'outbound-unknown',
}

export interface EventRouterOptions {
  consentTimeoutMs?: number;
  clock?: Clock;
  createNotificationId?: () => string;
}

type RouterEvents = {
  'inbound-created': [session: InboundSession];
  'inbound-refused': [event: ProtocolEvent];
  'outbound-changed': [session: OutboundSession];
};

// Receiving side of the handshake; no session exists before consent is asked
const INBOUND_HANDSHAKE_STATES: ReadonlySet<ProtocolState> = new Set([
  ProtocolState.Initial,
  ProtocolState.ReceivedConnectionRequest,
  ProtocolState.SentUkeyServerInit,
  ProtocolState.ReceivedUkeyClientFinish,
  ProtocolState.SentConnectionResponse,
  ProtocolState.SentPairedKeyEncryption,
  ProtocolState.SentPairedKeyResult,
  ProtocolState.ReceivedPairedKeyResult,
]);

export class EventRouter {
  private readonly events = new TypedEmitter<RouterEvents>('EventRouter');

  constructor(
    private readonly store: TransferStore,
    private readonly options: EventRouterOptions = {}
  ) {}

  onInboundCreated(listener: (session: InboundSession) => void): Unsubscribe {
    return this.events.on('inbound-created', listener);
  }

  onInboundRefused(listener: (event: ProtocolEvent) => void): Unsubscribe {
    return this.events.on('inbound-refused', listener);
  }

  onOutboundChanged(listener: (session: OutboundSession) => void): Unsubscribe {
    return this.events.on('outbound-changed', listener);
  }

  async route(message: EngineMessage): Promise<RouteOutcome> {
    // Actions addressed to the engine, ours included
    if (message.kind !== 'client') {
      return RouteOutcome.Ignored;
    }

    const { event } = message;
    const state = event.state ?? ProtocolState.Initial;

    // The direction tag of consent requests is not reliable
    if (state === ProtocolState.WaitingForUserConsent) {
      return this.openInbound(event);
    }

    if (event.direction === TransferDirection.Inbound) {
      if (INBOUND_HANDSHAKE_STATES.has(state)) {
        return RouteOutcome.Ignored;
      }
      return this.applyInbound(event);
    }

    return this.applyOutbound(event);
  }

  private async openInbound(event: ProtocolEvent): Promise<RouteOutcome> {
    const holder = this.store.inbound.current;
    if (holder && !holder.isClosed && holder.transferId === event.id) {
      return this.applyInbound(event);
    }

    const session = new InboundSession(event, {
      consentTimeoutMs: this.options.consentTimeoutMs,
      clock: this.options.clock,
      notificationId: this.options.createNotificationId?.(),
    });

    if (!(await this.store.inbound.occupy(session))) {
      logger.warn(`Inbound request ${event.id} refused, another transfer is in progress`);
      session.dispose();
      this.events.emit('inbound-refused', event);
      return RouteOutcome.InboundRefused;
    }

    logger.info(`Inbound request ${event.id} from ${session.deviceName}`);
    this.events.emit('inbound-created', session);
    session.armAutoDecline();
    return RouteOutcome.InboundCreated;
  }

  private async applyInbound(event: ProtocolEvent): Promise<RouteOutcome> {
    switch (await this.store.inbound.applyEvent(event)) {
      case 'applied':
        return RouteOutcome.InboundApplied;
      case 'closed':
        return RouteOutcome.InboundClosed;
      default:
        return RouteOutcome.InboundStale;
    }
  }

  private async applyOutbound(event: ProtocolEvent): Promise<RouteOutcome> {
    const state = await this.store.outbound.applyEvent(event);
    if (state === undefined) {
      return RouteOutcome.OutboundUnknown;
    }

    const session = this.store.outbound.peek(event.id);
    if (session) {
      this.events.emit('outbound-changed', session);
    }
    return RouteOutcome.OutboundApplied;
  }
}
