/**
 * Desktop Integration Interfaces
 * Notification portal payloads; delivery is fire-and-forget
 */

export enum NotificationPriority {
  Normal = 'normal',
  High = 'high',
}

export interface NotificationButton {
  label: string;
  action: string;
  target?: string;
}

export interface DesktopNotification {
  title: string;
  body: string;
  priority: NotificationPriority;
  persistent?: boolean;
  defaultAction?: string;
  defaultActionTarget?: string;
  buttons: NotificationButton[];
}

export interface NotificationSink {
  show(id: string, notification: DesktopNotification): Promise<void>;
  remove(id: string): Promise<void>;
}

export interface ToastMessage {
  text: string;
  action?: string;
}

/**
 * Desktop side effects behind the notification actions
 */
export interface DesktopLauncher {
  openFolder(path: string): Promise<void>;
  copyText(text: string): Promise<void>;
}
