/**
 * Transfer Interfaces
 * Types shared by the session state machines, registries and router
 */

export interface EndpointInfo {
  id: string;
  name?: string;
  address?: string;
  port?: number;
  present: boolean;
}

/**
 * Engine-reported phase of a transfer
 */
export enum ProtocolState {
  Initial = 'Initial',
  ReceivedConnectionRequest = 'ReceivedConnectionRequest',
  SentUkeyServerInit = 'SentUkeyServerInit',
  SentUkeyClientInit = 'SentUkeyClientInit',
  SentUkeyClientFinish = 'SentUkeyClientFinish',
  SentPairedKeyEncryption = 'SentPairedKeyEncryption',
  ReceivedUkeyClientFinish = 'ReceivedUkeyClientFinish',
  SentConnectionResponse = 'SentConnectionResponse',
  SentPairedKeyResult = 'SentPairedKeyResult',
  SentIntroduction = 'SentIntroduction',
  ReceivedPairedKeyResult = 'ReceivedPairedKeyResult',
  WaitingForUserConsent = 'WaitingForUserConsent',
  ReceivingFiles = 'ReceivingFiles',
  SendingFiles = 'SendingFiles',
  Disconnected = 'Disconnected',
  Rejected = 'Rejected',
  Cancelled = 'Cancelled',
  Finished = 'Finished',
}

export const TERMINAL_PROTOCOL_STATES: ReadonlySet<ProtocolState> = new Set([
  ProtocolState.Disconnected,
  ProtocolState.Rejected,
  ProtocolState.Cancelled,
  ProtocolState.Finished,
]);

export enum TransferDirection {
  Inbound = 'inbound',
  Outbound = 'outbound',
}

export enum PayloadKind {
  Files = 'files',
  Text = 'text',
  Url = 'url',
  WiFi = 'wifi',
}

export type TransferPayload =
  | { kind: PayloadKind.Files; files: string[] }
  | { kind: PayloadKind.Text; text: string }
  | { kind: PayloadKind.Url; url: string }
  | { kind: PayloadKind.WiFi; ssid: string; password: string };

export interface TransferMetadata {
  totalBytes: number;
  ackBytes: number;
  pinCode?: string;
  payloadKind: PayloadKind;
  payload?: TransferPayload;
  payloadPreview?: string;
  source?: { name: string };
}

export interface ProtocolEvent {
  readonly id: string;
  readonly direction: TransferDirection;
  readonly state?: ProtocolState;
  readonly metadata?: Readonly<TransferMetadata>;
}

/**
 * Actions the client sends back on the engine's event channel
 */
export enum TransferAction {
  ConsentAccept = 'ConsentAccept',
  ConsentDecline = 'ConsentDecline',
  TransferCancel = 'TransferCancel',
}

export type UserAction = TransferAction;

/**
 * UI-level state of a send attempt
 */
export enum OutboundTransferState {
  AwaitingConsentOrIdle = 'AwaitingConsentOrIdle',
  Queued = 'Queued',
  RequestedForConsent = 'RequestedForConsent',
  OngoingTransfer = 'OngoingTransfer',
  Failed = 'Failed',
  Done = 'Done',
}

export const ACTIVE_OUTBOUND_STATES: ReadonlySet<OutboundTransferState> = new Set([
  OutboundTransferState.RequestedForConsent,
  OutboundTransferState.OngoingTransfer,
]);

// Sessions in these states are removed when recipients are refreshed
export const SETTLED_OUTBOUND_STATES: ReadonlySet<OutboundTransferState> = new Set([
  OutboundTransferState.AwaitingConsentOrIdle,
  OutboundTransferState.Failed,
  OutboundTransferState.Done,
]);

export interface EtaEstimate {
  /** bytes per second, averaged over the recorded history */
  speed: number;
  remaining: number;
  seconds: number;
  text: string;
}

export interface OutboundSessionSnapshot {
  id: string;
  deviceName: string;
  present: boolean;
  files: string[];
  transferState: OutboundTransferState;
  protocolState?: ProtocolState;
  pinCode?: string;
  progress?: number;
  /** bytes per second, while sending */
  speed?: number;
  eta?: string;
}

export interface InboundSessionSnapshot {
  transferId: string;
  notificationId: string;
  deviceName: string;
  protocolState?: ProtocolState;
  userAction?: UserAction;
  userCancelled: boolean;
  closed: boolean;
  progress?: number;
  /** bytes per second, while receiving files */
  speed?: number;
  eta?: string;
}
