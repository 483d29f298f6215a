/**
 * Protocol Engine Interfaces
 * The narrow surface of the external nearby-sharing protocol engine
 */

import type { Receiver, Sink } from '../lib/channel.lib';
import type { EndpointInfo, ProtocolEvent, TransferAction } from './transfer.interface';

export enum Visibility {
  Visible = 'visible',
  Invisible = 'invisible',
}

export interface EngineSettings {
  deviceName: string;
  visibility: Visibility;
  downloadDir: string;
  staticPort?: number;
}

/**
 * Messages on the engine's shared event channel. `client` messages report
 * transfer progress; `lib` messages carry actions addressed to the engine,
 * including the client's own actions echoed back to every subscriber.
 */
export type EngineMessage =
  | { id: string; kind: 'client'; event: ProtocolEvent }
  | { id: string; kind: 'lib'; action: TransferAction };

export interface OutboundPayload {
  kind: 'files';
  files: string[];
}

export interface SendRequest {
  /** endpoint id; the engine reuses it as the transfer id */
  id: string;
  name: string;
  addr: string;
  payload: OutboundPayload;
}

export interface ProtocolEngine {
  start(settings: EngineSettings): Promise<void>;
  stop(): Promise<void>;

  subscribe(): Receiver<EngineMessage>;
  publish(message: EngineMessage): void;

  startDiscovery(sink: Sink<EndpointInfo>): void;
  stopDiscovery(): void;

  send(request: SendRequest): Promise<void>;

  setVisibility(visibility: Visibility): void;
  watchVisibility(): Receiver<Visibility>;
}
