/**
 * Logger utility for the application with color support
 */

import { LOG_LEVELS } from './constants';

export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

type LevelName = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

// Lower rank is more severe
const LEVEL_RANK: Record<LevelName, number> = {
  [LOG_LEVELS.ERROR]: 0,
  [LOG_LEVELS.WARN]: 1,
  [LOG_LEVELS.INFO]: 2,
  [LOG_LEVELS.DEBUG]: 3,
};

const LEVEL_NAME: Record<LogLevel, LevelName> = {
  [LogLevel.ERROR]: LOG_LEVELS.ERROR,
  [LogLevel.WARN]: LOG_LEVELS.WARN,
  [LogLevel.INFO]: LOG_LEVELS.INFO,
  [LogLevel.DEBUG]: LOG_LEVELS.DEBUG,
};

// ANSI color codes for terminal output
const Colors = {
  Reset: '\x1b[0m',
  Bright: '\x1b[1m',
  Red: '\x1b[31m',
  Green: '\x1b[32m',
  Yellow: '\x1b[33m',
  Blue: '\x1b[34m',
  Magenta: '\x1b[35m',
  Cyan: '\x1b[36m',
  White: '\x1b[37m',
  Gray: '\x1b[90m',
};

function resolveThreshold(): LevelName {
  const wanted = (process.env.LOG_LEVEL || '').trim().toLowerCase();
  const match = Object.values(LOG_LEVELS).find((level) => level === wanted);
  if (match) {
    return match;
  }
  return process.env.NODE_ENV === 'development' ? LOG_LEVELS.DEBUG : LOG_LEVELS.INFO;
}

export class Logger {
  private static instance: Logger;
  private threshold: LevelName = resolveThreshold();

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LevelName): void {
    this.threshold = level;
  }

  getLevel(): LevelName {
    return this.threshold;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[LEVEL_NAME[level]] <= LEVEL_RANK[this.threshold];
  }

  private getColorForLevel(level: LogLevel): string {
    switch (level) {
      case LogLevel.INFO:
        return Colors.Cyan;
      case LogLevel.WARN:
        return Colors.Yellow;
      case LogLevel.ERROR:
        return Colors.Red;
      case LogLevel.DEBUG:
        return Colors.Magenta;
      default:
        return Colors.White;
    }
  }

  private getIconForLevel(level: LogLevel): string {
    switch (level) {
      case LogLevel.INFO:
        return 'ℹ️';
      case LogLevel.WARN:
        return '⚠️';
      case LogLevel.ERROR:
        return '❌';
      case LogLevel.DEBUG:
        return '🔍';
      default:
        return '📝';
    }
  }

  private write(level: string, icon: string, color: string, message: string, args: unknown[]) {
    const timestamp = new Date().toISOString();

    // Format: [timestamp] [icon LEVEL] message
    const coloredTimestamp = `${Colors.Gray}[${timestamp}]${Colors.Reset}`;
    const coloredLevel = `${color}${Colors.Bright}[${icon} ${level}]${Colors.Reset}`;
    const coloredMessage = `${color}${message}${Colors.Reset}`;

    const line = `${coloredTimestamp} ${coloredLevel} ${coloredMessage}`;
    if (level === LogLevel.ERROR) {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  private log(level: LogLevel, message: string, ...args: unknown[]) {
    if (!this.isEnabled(level)) {
      return;
    }
    this.write(level, this.getIconForLevel(level), this.getColorForLevel(level), message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, ...args);
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  // Milestones are logged at info level with their own marker
  success(message: string, ...args: unknown[]) {
    if (this.isEnabled(LogLevel.INFO)) {
      this.write('SUCCESS', '✅', Colors.Green, message, args);
    }
  }

  loading(message: string, ...args: unknown[]) {
    if (this.isEnabled(LogLevel.INFO)) {
      this.write('LOADING', '⏳', Colors.Blue, message, args);
    }
  }
}

export const logger = Logger.getInstance();
