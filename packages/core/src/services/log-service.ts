/**
 * Structured logging with a bounded history the gateway serves at /api/logs
 */

import { nanoid } from 'nanoid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  service: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogFilter {
  level?: LogLevel;
  /** Case-insensitive substring of the service name */
  service?: string;
}

/** Prints an accepted entry */
export type LogSink = (entry: LogEntry) => void;

export const consoleSink: LogSink = ({ level, service, message, data }) => {
  const print = level === 'error' ? console.error :
                level === 'warn' ? console.warn : console.log;

  if (data && Object.keys(data).length > 0) {
    print(`[${service}]`, message, data);
  } else {
    print(`[${service}]`, message);
  }
};

export interface LogServiceOptions {
  /** Entries kept for getRecent(); oldest are dropped first */
  capacity?: number;
  level?: LogLevel;
  sink?: LogSink;
}

export class LogService {
  private entries: LogEntry[] = [];
  private capacity: number;
  private minLevel: LogLevel;
  private sink: LogSink;

  constructor(options: LogServiceOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.minLevel = options.level ?? 'info';
    this.sink = options.sink ?? consoleSink;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  log(level: LogLevel, service: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      id: nanoid(12),
      timestamp: Date.now(),
      level,
      service,
      message,
      data
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    this.sink(entry);
  }

  /**
   * The newest `count` entries matching the filter, oldest first
   */
  getRecent(count: number = 100, filter: LogFilter = {}): LogEntry[] {
    const service = filter.service?.toLowerCase();
    const matching = this.entries.filter(entry =>
      (!filter.level || entry.level === filter.level) &&
      (!service || entry.service.toLowerCase().includes(service))
    );
    return count > 0 ? matching.slice(-count) : [];
  }

  getStats(): { count: number; capacity: number; level: LogLevel; oldestTimestamp?: number } {
    return {
      count: this.entries.length,
      capacity: this.capacity,
      level: this.minLevel,
      oldestTimestamp: this.entries[0]?.timestamp
    };
  }
}

export const logService = new LogService();

export const log = {
  debug: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('debug', service, message, data),

  info: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('info', service, message, data),

  warn: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('warn', service, message, data),

  error: (service: string, message: string, data?: Record<string, unknown>) =>
    logService.log('error', service, message, data),
};
