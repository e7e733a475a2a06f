// ============================================================================
// @armory/core — Logging & Timing
// ============================================================================

import process from 'node:process';

/**
 * Log levels for Armory.
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

export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = levelFromEnv(process.env.ARMORY_DEBUG);

/**
 * Map the ARMORY_DEBUG environment value to a level.
 */
export function levelFromEnv(raw: string | undefined): LogLevel {
  if (raw === '1' || raw === 'true') return 'debug';
  if (raw === 'warn') return 'warn';
  if (raw === 'error') return 'error';
  return 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[Armory] ${message}${dataStr}`;

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
      console.error('[Armory] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only emitted when ARMORY_DEBUG=1 or the level is set to debug.
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
 * Wall-clock timer around a single operation.
 */
export class Timer {
  private readonly startTime: number;
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result.
   */
  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
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
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a finished solver run.
 */
export function logSolve(
  strategy: string,
  itemCount: number,
  selectedCount: number,
  totalValue: number,
  durationMs: number,
): void {
  debug(`solve[${strategy}]: ${selectedCount}/${itemCount} items, value ${totalValue}`, {
    strategy,
    items: itemCount,
    selected: selectedCount,
    totalValue,
    durationMs,
  });
}

/**
 * Log a finished database load.
 */
export function logLoad(path: string, loaded: number, skipped: number): void {
  debug(`load: ${loaded} items from ${path} (${skipped} skipped)`, {
    path,
    loaded,
    skipped,
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}
