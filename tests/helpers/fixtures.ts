import { EngineMessage } from '../../src/main/interfaces/engine.interface';
import {
  EndpointInfo,
  PayloadKind,
  ProtocolEvent,
  ProtocolState,
  TransferAction,
  TransferDirection,
  TransferMetadata,
} from '../../src/main/interfaces/transfer.interface';

export function endpoint(id: string, overrides: Partial<EndpointInfo> = {}): EndpointInfo {
  return { id, name: `Device ${id}`, address: '192.168.1.20', port: 4455, present: true, ...overrides };
}

export function filesMetadata(
  files: string[],
  totalBytes: number,
  ackBytes = 0,
  overrides: Partial<TransferMetadata> = {}
): TransferMetadata {
  return {
    totalBytes,
    ackBytes,
    payloadKind: PayloadKind.Files,
    payload: { kind: PayloadKind.Files, files },
    source: { name: 'Pixel' },
    ...overrides,
  };
}

export function textMetadata(text: string, overrides: Partial<TransferMetadata> = {}): TransferMetadata {
  return {
    totalBytes: text.length,
    ackBytes: 0,
    payloadKind: PayloadKind.Text,
    payload: { kind: PayloadKind.Text, text },
    payloadPreview: text,
    source: { name: 'Pixel' },
    ...overrides,
  };
}

export function outboundEvent(id: string, state?: ProtocolState, metadata?: TransferMetadata): ProtocolEvent {
  return { id, direction: TransferDirection.Outbound, state, metadata };
}

export function inboundEvent(id: string, state?: ProtocolState, metadata?: TransferMetadata): ProtocolEvent {
  return { id, direction: TransferDirection.Inbound, state, metadata };
}

export function clientMessage(event: ProtocolEvent): EngineMessage {
  return { id: event.id, kind: 'client', event };
}

export function libMessage(id: string, action: TransferAction): EngineMessage {
  return { id, kind: 'lib', action };
}

/**
 * Let pending promise chains run to completion
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
