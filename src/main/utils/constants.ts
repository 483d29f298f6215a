/**
 * Application Constants
 * Central location for all constant values used across the application
 */

// Application Information
export const APP_INFO = {
  NAME: 'Nearby Transfer',
  VERSION: '1.0.0',
  DESCRIPTION: 'Transfer session coordinator for nearby-device file and text sharing',
} as const;

// Protocol engine defaults
export const ENGINE = {
  DEFAULT_DEVICE_NAME: 'Desktop',
  MIN_PORT: 1024,
  MAX_PORT: 65535,
  DISCOVERY_BROADCAST_CAPACITY: 10,
  HANDOFF_CHANNEL_CAPACITY: 1,
} as const;

// Transfer timing
export const TIMING = {
  CONSENT_TIMEOUT_MS: 60_000, // 1 minute
  ETA_SECOND_MS: 1000,
} as const;

// ETA estimation
export const ETA = {
  HISTORY_SIZE: 5,
  HOURS_THRESHOLD_SECS: 6000,
  MINUTES_THRESHOLD_SECS: 100,
  UNKNOWN: 'Unknown',
} as const;

// Actions arriving on the inter-process action bus
export const BUS_ACTIONS = {
  CONSENT_ACCEPT: 'consent-accept',
  CONSENT_DECLINE: 'consent-decline',
  TRANSFER_CANCEL: 'transfer-cancel',
  OPEN_FOLDER: 'open-folder',
  COPY_TEXT: 'copy-text',
  SEND_FILES: 'send-files',
} as const;

// User-facing messages
export const MESSAGES = {
  UNKNOWN_DEVICE: 'Unknown device',
  INCOMING_TRANSFER: 'Incoming Transfer',
  RECEIVING: 'Receiving...',
  REQUEST_TIMED_OUT: 'Request timed out',
  CANCELLED_BY_SENDER: 'Transfer cancelled by sender',
  UNEXPECTED_DISCONNECTION: 'Unexpected disconnection',
  SERVICE_UNAVAILABLE: 'Transfer service is unavailable, retry to start it again',
  BUTTONS: {
    ACCEPT: 'Accept',
    DECLINE: 'Decline',
    CANCEL: 'Cancel',
    OPEN: 'Open',
    COPY: 'Copy',
  },
} as const;

// File Size Units
export const FILE_SIZE_UNITS = ['Bytes', 'KB', 'MB', 'GB', 'TB'] as const;

// Logging Levels, most severe first
export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
} as const;

// Error Types
export const ERROR_TYPES = {
  ENGINE_UNAVAILABLE: 'ENGINE_UNAVAILABLE',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  UNKNOWN_ENDPOINT: 'UNKNOWN_ENDPOINT',
  ENDPOINT_UNAVAILABLE: 'ENDPOINT_UNAVAILABLE',
  UNKNOWN_TRANSFER: 'UNKNOWN_TRANSFER',
  TRANSFER_ACTIVE: 'TRANSFER_ACTIVE',
  NO_PENDING_REQUEST: 'NO_PENDING_REQUEST',
  INVALID_ACTION: 'INVALID_ACTION',
  CHANNEL_CLOSED: 'CHANNEL_CLOSED',
} as const;

export type ErrorType = (typeof ERROR_TYPES)[keyof typeof ERROR_TYPES];

// Text shown in notifications is cut to this many characters
export const NOTIFICATION = {
  TEXT_PREVIEW_LENGTH: 48,
} as const;
