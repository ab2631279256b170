/**
 * Structured logging utility
 * Provides consistent logging across all layers.
 *
 * Every entry is written to stderr: stdout belongs to command output.
 */

import { getConfig, type LogLevel } from './config.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  layer: string;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = ['secret', 'privatekey', 'password'];

const FALLBACK_LEVEL: LogLevel = 'warn';

/**
 * Configured LOG_LEVEL, or the fallback level while the configuration is invalid.
 * Logging never throws; getConfig() reports the invalid value to its own callers.
 */
function configuredLevel(): LogLevel {
  try {
    return getConfig().LOG_LEVEL;
  } catch {
    return FALLBACK_LEVEL;
  }
}

export class Logger {
  private minLevel?: LogLevel;
  private layer: string;

  /**
   * Without an explicit level the configured LOG_LEVEL is read on first use
   */
  constructor(layer: string, minLevel?: LogLevel) {
    this.layer = layer;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.minLevel ?? configuredLevel();
    return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
  }

  formatEntry(entry: LogEntry): string {
    const { timestamp, level, layer, message, data } = entry;
    const prefix = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${layer}]`;

    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(sanitize(data))}`;
    }

    return `${prefix} ${message}`;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      layer: this.layer,
      message,
      data,
    };

    console.error(this.formatEntry(entry));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace every value whose key looks like secret material, at any depth
 */
export function sanitize(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase().replace(/[_-]/g, '');
    if (SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk))) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Create a logger for a specific layer
 */
export function createLogger(layer: string): Logger {
  return new Logger(layer);
}
