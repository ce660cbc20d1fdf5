// ============================================================================
// @sufftree/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for sufftree.
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

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Current log level (controlled by SUFFTREE_DEBUG env var).
 */
let currentLevel: LogLevel = levelFromEnv(process.env.SUFFTREE_DEBUG);

/**
 * Map the SUFFTREE_DEBUG value onto a level.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
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
  const msg = `[sufftree] ${message}${dataStr}`;

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
      console.error('[sufftree] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only logs when SUFFTREE_DEBUG=1 is set.
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

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Measures the duration of an operation.
 */
export class Timer {
  private startTime: number;
  readonly label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /** Elapsed milliseconds, without logging. */
  elapsed(): number {
    return performance.now() - this.startTime;
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
 * Log a finished construction.
 */
export function logBuild(bytes: number, nodes: number, leaves: number, durationMs: number): void {
  debug(`build: ${durationMs.toFixed(2)}ms for ${bytes} bytes (${nodes} nodes, ${leaves} leaves)`, {
    bytes,
    nodes,
    leaves,
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
