// ============================================================================
// @statemap/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for StateMap.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Map a STATEMAP_DEBUG value to a log level.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

/**
 * Current log level (controlled by STATEMAP_DEBUG env var).
 */
let currentLevel: LogLevel = levelFromEnv(process.env.STATEMAP_DEBUG);

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a log entry and emit to callbacks.
 */
function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[StateMap] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[StateMap] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when STATEMAP_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result, with `data`, at debug level.
   */
  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log interner growth. Called when the table size reaches a power of two.
 */
export function logInternerGrowth(size: number, capacity: number): void {
  debug(`interner grew to ${size} strings`, { size, capacity });
}

/**
 * Log a snapshot restore.
 */
export function logRestore(entries: number, durationMs: number): void {
  debug(`restore: ${durationMs.toFixed(2)}ms for ${entries} entries`, {
    entries,
    durationMs,
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
