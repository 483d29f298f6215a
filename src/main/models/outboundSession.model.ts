/**
 * Outbound session
 * UI-level state of one send attempt to a discovered endpoint, driven by the
 * engine's protocol events and local queueing
 */

import { TypedEmitter, Unsubscribe } from '../lib/emitter.lib';
import { Clock, EtaEstimator } from '../lib/eta.lib';
import { progressFraction } from '../lib/payload.lib';
import {
  ACTIVE_OUTBOUND_STATES,
  EndpointInfo,
  OutboundSessionSnapshot,
  OutboundTransferState,
  ProtocolEvent,
  ProtocolState,
  SETTLED_OUTBOUND_STATES,
  TERMINAL_PROTOCOL_STATES,
} from '../interfaces/transfer.interface';
import { MESSAGES } from '../utils/constants';

export interface OutboundStateChange {
  previous: OutboundTransferState;
  current: OutboundTransferState;
  event?: ProtocolEvent;
}

type OutboundSessionEvents = {
  changed: [change: OutboundStateChange];
  'endpoint-changed': [endpoint: EndpointInfo];
};

// Client-side handshake steps, reported once the request reaches the receiver
const CONSENT_REQUEST_STATES: ReadonlySet<ProtocolState> = new Set([
  ProtocolState.SentUkeyClientInit,
  ProtocolState.SentUkeyClientFinish,
  ProtocolState.SentIntroduction,
]);

export class OutboundSession {
  readonly id: string;
  readonly eta: EtaEstimator;
  private endpointInfo: EndpointInfo;
  private fileList: string[] = [];
  private state = OutboundTransferState.AwaitingConsentOrIdle;
  private lastEvent: ProtocolEvent | undefined;
  private readonly events: TypedEmitter<OutboundSessionEvents>;

  constructor(endpoint: EndpointInfo, clock?: Clock) {
    this.id = endpoint.id;
    this.endpointInfo = { ...endpoint };
    this.eta = new EtaEstimator(0, clock);
    this.events = new TypedEmitter(`OutboundSession(${endpoint.id})`);
  }

  get endpoint(): EndpointInfo {
    return { ...this.endpointInfo };
  }

  get deviceName(): string {
    return this.endpointInfo.name || MESSAGES.UNKNOWN_DEVICE;
  }

  get isPresent(): boolean {
    return this.endpointInfo.present;
  }

  get files(): readonly string[] {
    return this.fileList;
  }

  get transferState(): OutboundTransferState {
    return this.state;
  }

  get event(): ProtocolEvent | undefined {
    return this.lastEvent;
  }

  get pinCode(): string | undefined {
    return this.lastEvent?.metadata?.pinCode;
  }

  get progress(): number | undefined {
    if (this.state !== OutboundTransferState.OngoingTransfer) {
      return undefined;
    }
    return progressFraction(this.lastEvent?.metadata);
  }

  onChanged(listener: (change: OutboundStateChange) => void): Unsubscribe {
    return this.events.on('changed', listener);
  }

  onEndpointChanged(listener: (endpoint: EndpointInfo) => void): Unsubscribe {
    return this.events.on('endpoint-changed', listener);
  }

  updateEndpoint(endpoint: EndpointInfo): void {
    if (endpoint.id !== this.id) {
      throw new RangeError(`Endpoint ${endpoint.id} doesn't belong to session ${this.id}`);
    }
    this.endpointInfo = { ...endpoint };
    this.events.emit('endpoint-changed', this.endpoint);
  }

  /**
   * Files for the next send; the estimator starts over with their total size
   */
  setFiles(files: readonly string[], totalBytes: number): void {
    this.fileList = [...files];
    this.eta.prepareForNewTransfer(totalBytes);
  }

  markQueued(): void {
    this.transition(OutboundTransferState.Queued);
  }

  /**
   * A new send may start from an idle, failed or finished session whose
   * endpoint is still around
   */
  canSend(): boolean {
    return this.isPresent && SETTLED_OUTBOUND_STATES.has(this.state);
  }

  isActive(): boolean {
    return ACTIVE_OUTBOUND_STATES.has(this.state);
  }

  /**
   * The engine is mid-transfer for this endpoint
   */
  isEngineBusy(): boolean {
    const state = this.lastEvent?.state;
    return state !== undefined && state !== ProtocolState.Initial && !TERMINAL_PROTOCOL_STATES.has(state);
  }

  applyEvent(event: ProtocolEvent): OutboundTransferState {
    const state = event.state ?? ProtocolState.Initial;
    let next = this.state;
    this.lastEvent = event;

    if (CONSENT_REQUEST_STATES.has(state)) {
      next = OutboundTransferState.RequestedForConsent;
      // Transfer length is already known from the selected files
      this.eta.prepareForNewTransfer();
    } else {
      switch (state) {
        case ProtocolState.SendingFiles:
          next = OutboundTransferState.OngoingTransfer;
          if (event.metadata) {
            this.eta.stepWith(event.metadata.ackBytes);
          }
          break;
        case ProtocolState.Disconnected:
        case ProtocolState.Rejected:
          // The engine reports a declined request the same way as a failure
          next = OutboundTransferState.Failed;
          break;
        case ProtocolState.Cancelled:
          next = OutboundTransferState.AwaitingConsentOrIdle;
          this.lastEvent = undefined;
          break;
        case ProtocolState.Finished:
          next = OutboundTransferState.Done;
          break;
        default:
          break;
      }
    }

    this.transition(next, event);
    return next;
  }

  etaText(): string {
    return this.eta.estimateText();
  }

  snapshot(): OutboundSessionSnapshot {
    const estimate = this.state === OutboundTransferState.OngoingTransfer ? this.eta.estimate() : undefined;
    return {
      id: this.id,
      deviceName: this.deviceName,
      present: this.isPresent,
      files: [...this.fileList],
      transferState: this.state,
      protocolState: this.lastEvent?.state,
      pinCode: this.pinCode,
      progress: this.progress,
      speed: estimate?.speed,
      eta: estimate?.text,
    };
  }

  dispose(): void {
    this.events.removeAllListeners();
  }

  private transition(next: OutboundTransferState, event?: ProtocolEvent): void {
    const previous = this.state;
    this.state = next;
    this.events.emit('changed', { previous, current: next, event });
  }
}
