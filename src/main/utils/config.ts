/**
 * Nearby Transfer - Configuration
 * Uses values from constants and environment variables
 */

import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { EngineSettings, Visibility } from '../interfaces/engine.interface';
import { parsePort } from '../lib/network.lib';
import { APP_INFO, ENGINE, LOG_LEVELS, TIMING } from './constants';

dotenv.config();

export type LogLevelName = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

function parseLogLevel(value: string | undefined): LogLevelName {
  const normalized = (value || '').trim().toLowerCase();
  return Object.values(LOG_LEVELS).find((level) => level === normalized) || LOG_LEVELS.INFO;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Environment variables with fallbacks
export const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  APP_NAME: process.env.APP_NAME || APP_INFO.NAME,
  DEVICE_NAME: process.env.DEVICE_NAME || os.hostname() || ENGINE.DEFAULT_DEVICE_NAME,
  DOWNLOAD_DIR: process.env.DOWNLOAD_DIR || path.join(os.homedir(), 'Downloads'),
  DEVICE_VISIBLE: parseBoolean(process.env.DEVICE_VISIBLE, true),
  STATIC_PORT: parsePort(process.env.STATIC_PORT),
  CONSENT_TIMEOUT_MS: parsePositiveInt(process.env.CONSENT_TIMEOUT_MS, TIMING.CONSENT_TIMEOUT_MS),
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
} as const;

// Application configuration using constants
export const APP_CONFIG = {
  name: ENV.APP_NAME,
  version: APP_INFO.VERSION,
  description: APP_INFO.DESCRIPTION,
  transfer: {
    consentTimeoutMs: ENV.CONSENT_TIMEOUT_MS,
    discoveryBroadcastCapacity: ENGINE.DISCOVERY_BROADCAST_CAPACITY,
  },
};

/**
 * Engine settings as read from the environment at startup
 */
export function loadEngineSettings(): EngineSettings {
  return {
    deviceName: ENV.DEVICE_NAME,
    visibility: ENV.DEVICE_VISIBLE ? Visibility.Visible : Visibility.Invisible,
    downloadDir: ENV.DOWNLOAD_DIR,
    staticPort: ENV.STATIC_PORT,
  };
}
