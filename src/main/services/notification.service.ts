/**
 * Notification Service
 * Turns inbound transfer milestones into desktop notifications. Delivery is
 * fire-and-forget: sink failures are logged and never reach the caller.
 */

import { countOf, truncate } from '../lib/format.lib';
import {
  cleanPreviewText,
  cleanTextPayload,
  deviceName,
  payloadFiles,
  textPreview,
  transferredText,
} from '../lib/payload.lib';
import {
  DesktopNotification,
  NotificationPriority,
  NotificationSink,
} from '../interfaces/integration.interface';
import { PayloadKind, ProtocolEvent } from '../interfaces/transfer.interface';
import { BUS_ACTIONS, MESSAGES, NOTIFICATION } from '../utils/constants';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export function incomingRequestNotification(event: ProtocolEvent): DesktopNotification {
  const files = payloadFiles(event);
  const subject = files
    ? countOf(files.length, 'File', 'Files')
    : `"${cleanPreviewText(textPreview(event) ?? '')}"`;

  return {
    title: MESSAGES.INCOMING_TRANSFER,
    body: `${deviceName(event)} wants to share ${subject}`,
    priority: NotificationPriority.High,
    persistent: true,
    defaultAction: BUS_ACTIONS.CONSENT_ACCEPT,
    buttons: [
      { label: MESSAGES.BUTTONS.DECLINE, action: BUS_ACTIONS.CONSENT_DECLINE },
      { label: MESSAGES.BUTTONS.ACCEPT, action: BUS_ACTIONS.CONSENT_ACCEPT },
    ],
  };
}

export function receivingNotification(event: ProtocolEvent): DesktopNotification {
  return {
    title: deviceName(event),
    body: MESSAGES.RECEIVING,
    priority: NotificationPriority.High,
    persistent: true,
    buttons: [{ label: MESSAGES.BUTTONS.CANCEL, action: BUS_ACTIONS.TRANSFER_CANCEL }],
  };
}

export function finishedNotification(event: ProtocolEvent, downloadDir: string): DesktopNotification {
  const received = transferredText(event);
  if (received) {
    const text = received.type === PayloadKind.Text ? cleanTextPayload(received.text) : received.text;
    return {
      title: deviceName(event),
      body: `Received "${truncate(text, NOTIFICATION.TEXT_PREVIEW_LENGTH)}"`,
      priority: NotificationPriority.High,
      defaultAction: BUS_ACTIONS.COPY_TEXT,
      defaultActionTarget: text,
      buttons: [{ label: MESSAGES.BUTTONS.COPY, action: BUS_ACTIONS.COPY_TEXT, target: text }],
    };
  }

  const count = payloadFiles(event)?.length ?? 0;
  return {
    title: deviceName(event),
    body: `${countOf(count, 'file', 'files')} received`,
    priority: NotificationPriority.High,
    defaultAction: BUS_ACTIONS.OPEN_FOLDER,
    defaultActionTarget: downloadDir,
    buttons: [{ label: MESSAGES.BUTTONS.OPEN, action: BUS_ACTIONS.OPEN_FOLDER, target: downloadDir }],
  };
}

function noticeNotification(event: ProtocolEvent, body: string): DesktopNotification {
  return {
    title: deviceName(event),
    body,
    priority: NotificationPriority.High,
    buttons: [],
  };
}

export class NotificationService {
  constructor(
    private readonly sink: NotificationSink,
    private readonly downloadDir: () => string
  ) {}

  incomingRequest(id: string, event: ProtocolEvent): void {
    this.show(id, incomingRequestNotification(event));
  }

  receiving(id: string, event: ProtocolEvent): void {
    this.show(id, receivingNotification(event));
  }

  finished(id: string, event: ProtocolEvent): void {
    this.show(id, finishedNotification(event, this.downloadDir()));
  }

  cancelledBySender(id: string, event: ProtocolEvent): void {
    this.show(id, noticeNotification(event, MESSAGES.CANCELLED_BY_SENDER));
  }

  disconnected(id: string, event: ProtocolEvent): void {
    this.show(id, noticeNotification(event, MESSAGES.UNEXPECTED_DISCONNECTION));
  }

  dismiss(id: string): void {
    void this.sink.remove(id).catch((err: unknown) => {
      logger.warn(`Failed to remove notification ${id}:`, errorMessage(err));
    });
  }

  private show(id: string, notification: DesktopNotification): void {
    void this.sink.show(id, notification).catch((err: unknown) => {
      logger.warn(`Failed to show notification ${id}:`, errorMessage(err));
    });
  }
}
