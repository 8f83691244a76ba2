/**
 * Logger - Level-gated console logging
 *
 * Every message is kept in a bounded in-memory buffer whatever the level;
 * only messages at or above the active level reach the console.
 */

import { BUFFER_SIZES } from '../config/constants.js';
import type { LogLevelName } from '../types/index.js';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
}

function serialize(args: unknown[]): string {
  const message = args.map(arg => {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === 'object' && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return '[Circular]';
      }
    }
    return String(arg);
  }).join(' ');

  return message.length > BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH
    ? message.substring(0, BUFFER_SIZES.MAX_LOG_MESSAGE_LENGTH) + '... [truncated]'
    : message;
}

export class Logger {
  private static instance: Logger | null = null;
  private logLevel: LogLevel = LogLevel.INFO;
  private logBuffer: LogEntry[] = [];

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Set the log level from its configuration name
   */
  setLevelByName(name: LogLevelName): void {
    this.logLevel = LEVELS_BY_NAME[name];
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  error(...args: unknown[]): void {
    this.write(LogLevel.ERROR, console.error, args);
  }

  warn(...args: unknown[]): void {
    this.write(LogLevel.WARN, console.warn, args);
  }

  debug(...args: unknown[]): void {
    this.write(LogLevel.DEBUG, console.log, args);
  }

  getAllLogs(): LogEntry[] {
    return [...this.logBuffer];
  }

  clearLogs(): void {
    this.logBuffer = [];
  }

  private write(level: LogLevel, print: (...args: unknown[]) => void, args: unknown[]): void {
    this.logBuffer.push({ timestamp: Date.now(), level, message: serialize(args) });
    if (this.logBuffer.length > BUFFER_SIZES.MAX_LOG_BUFFER_SIZE) {
      this.logBuffer.shift();
    }
    if (this.logLevel >= level) {
      print(...args);
    }
  }
}

export const logger = Logger.getInstance();
