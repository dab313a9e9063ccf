// Logger Module
// Console logger with an optional LoggerStore that keeps recent entries

import { computed, signal } from '@preact/signals-core';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  id: string;
  timestamp: Date;
  elapsed: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Minimal logger interface for dependency injection
 * Both Logger and LoggerStore implement this
 */
export interface ILogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
  debug?(message: string, data?: Record<string, unknown>): void;
  child?(prefix: string): ILogger;
}

// ========== Helper Functions ==========

let nextLogId = 0;

function generateLogId(): string {
  nextLogId++;
  return `${Date.now()}-${nextLogId}`;
}

/**
 * Format duration in ms to HH:MM:SS
 */
export function formatElapsedTime(startTime: number, now: number = Date.now()): string {
  const elapsed = Math.max(0, Math.floor((now - startTime) / 1000));
  const hours = Math.floor(elapsed / 3600);
  const minutes = Math.floor((elapsed % 3600) / 60);
  const seconds = elapsed % 60;
  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
}

function formatData(data?: Record<string, unknown>): string {
  return data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
}

// ========== Logger ==========

/**
 * Logger - logs to console and LoggerStore
 */
export class Logger implements ILogger {
  private readonly store: LoggerStore | null;
  private readonly prefix: string;
  private readonly startTime: number;

  constructor(store?: LoggerStore, prefix: string = '', startTime: number = Date.now()) {
    this.store = store ?? null;
    this.prefix = prefix;
    this.startTime = startTime;
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private stamp(): string {
    return formatElapsedTime(this.startTime);
  }

  /**
   * Log debug message (console only - not stored)
   */
  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(`[${this.stamp()}] [DEBUG] ${this.formatMessage(message)}${formatData(data)}`);
  }

  info(message: string, data?: Record<string, unknown>): void {
    const formatted = this.formatMessage(message);
    console.log(`[${this.stamp()}] [INFO] ${formatted}${formatData(data)}`);
    this.store?.add('info', formatted, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    const formatted = this.formatMessage(message);
    console.warn(`[${this.stamp()}] [WARN] ${formatted}${formatData(data)}`);
    this.store?.add('warn', formatted, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    const formatted = this.formatMessage(message);
    const errorData = error ? { ...data, error: error.message } : data;

    console.error(`[${this.stamp()}] [ERROR] ${formatted}${formatData(errorData)}`);
    if (error?.stack) {
      console.debug(error.stack);
    }
    this.store?.add('error', formatted, errorData);
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(this.store ?? undefined, childPrefix, this.startTime);
  }
}

export function createLogger(store?: LoggerStore, prefix?: string): Logger {
  return new Logger(store, prefix);
}

// ========== LoggerStore ==========

/**
 * Logger Store - keeps the most recent log entries for the status view
 */
export class LoggerStore {
  readonly entries = signal<LogEntry[]>([]);

  readonly maxEntries = signal<number>(200);

  readonly startTime = signal<number | null>(null);

  /**
   * Warnings and errors only, oldest first
   */
  readonly alerts = computed(() => this.entries.value.filter((e) => e.level !== 'info'));

  startTimer(now: number = Date.now()): void {
    this.startTime.value = now;
  }

  add(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const start = this.startTime.value;
    const entry: LogEntry = {
      id: generateLogId(),
      timestamp: new Date(),
      elapsed: start !== null ? formatElapsedTime(start) : '00:00:00',
      level,
      message,
      data,
    };

    const newEntries = [...this.entries.value, entry];

    if (newEntries.length > this.maxEntries.value) {
      newEntries.splice(0, newEntries.length - this.maxEntries.value);
    }

    this.entries.value = newEntries;
  }

  /**
   * Last `limit` warnings and errors formatted for display
   */
  recentAlerts(limit: number): string[] {
    return this.alerts.value.slice(-limit).map((e) => `[${e.elapsed}] [${e.level.toUpperCase()}] ${e.message}`);
  }
}

export function createLoggerStore(): LoggerStore {
  return new LoggerStore();
}
