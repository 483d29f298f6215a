/**
 * Payload helpers
 * Read device and payload details out of protocol events
 */

import { PayloadKind, ProtocolEvent, TransferMetadata } from '../interfaces/transfer.interface';
import { MESSAGES } from '../utils/constants';

export type TextPayloadType = PayloadKind.Text | PayloadKind.Url | PayloadKind.WiFi;

export interface TextPayload {
  text: string;
  type: TextPayloadType;
}

export function deviceName(event: ProtocolEvent): string {
  return event.metadata?.source?.name || MESSAGES.UNKNOWN_DEVICE;
}

export function payloadFiles(event: ProtocolEvent): string[] | undefined {
  const payload = event.metadata?.payload;
  return payload?.kind === PayloadKind.Files ? payload.files : undefined;
}

export function textPreview(event: ProtocolEvent): string | undefined {
  return event.metadata?.payloadPreview;
}

export function isTextPayload(event: ProtocolEvent): boolean {
  const kind = event.metadata?.payloadKind;
  return kind === PayloadKind.Text || kind === PayloadKind.Url || kind === PayloadKind.WiFi;
}

export function transferredText(event: ProtocolEvent): TextPayload | undefined {
  const payload = event.metadata?.payload;
  switch (payload?.kind) {
    case PayloadKind.Text:
      return { text: payload.text, type: PayloadKind.Text };
    case PayloadKind.Url:
      return { text: payload.url, type: PayloadKind.Url };
    case PayloadKind.WiFi:
      return { text: `${payload.ssid}: ${payload.password}`, type: PayloadKind.WiFi };
    default:
      return undefined;
  }
}

/**
 * Some senders wrap shared text as `"..."` followed by a newline
 */
export function cleanTextPayload(text: string): string {
  if (text.length >= 3 && text.startsWith('"') && text.endsWith('"\n')) {
    return text.slice(1, -2);
  }
  return text;
}

function trimQuotesAndNewlines(text: string): string {
  return text.replace(/^["\n]+|["\n]+$/g, '');
}

/**
 * First line of the text payload, without wrapping quotes
 */
export function cleanPreviewText(text: string): string {
  const firstLine = trimQuotesAndNewlines(cleanTextPayload(text)).split('\n')[0] || '';
  return trimQuotesAndNewlines(firstLine);
}

export function progressFraction(metadata: Readonly<TransferMetadata> | undefined): number | undefined {
  if (!metadata || metadata.totalBytes <= 0) {
    return undefined;
  }
  return metadata.ackBytes / metadata.totalBytes;
}
