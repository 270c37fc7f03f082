/**
 * Lightweight structured logger for MindRoom.
 *
 * Usage:
 * ```ts
 * import { logger } from '@mindroom/shared';
 * const log = logger('mindmap');
 * log.debug('outline parsed', { nodes: 6 });
 * ```
 *
 * All levels (including debug) are ON by default. Debug output is
 * controlled with `MINDROOM_DEBUG`:
 * - unset / empty: on for every namespace
 * - `false` or `0`: off
 * - `true`, `1` or `*`: on for every namespace
 * - `mindmap,rooms`: on only for the listed namespaces
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

const CONSOLE_METHOD: Record<LogLevel, 'log' | 'info' | 'warn' | 'error'> = {
  debug: 'log',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Read the raw debug configuration; `''` when nothing is set. */
function getDebugConfig(): string {
  return process.env['MINDROOM_DEBUG']?.trim() ?? '';
}

/**
 * Determine whether `debug`-level output is suppressed for `namespace`.
 *
 * `info`, `warn`, and `error` are never suppressed.
 */
export function isDebugSuppressed(namespace: string, config: string = getDebugConfig()): boolean {
  if (!config) return false;
  if (config === 'false' || config === '0') return true;
  if (config === 'true' || config === '1' || config === '*') return false;
  const namespaces = config.split(',').map((s) => s.trim());
  return !namespaces.includes(namespace);
}

function shouldLog(level: LogLevel, namespace: string): boolean {
  if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.info) {
    return true;
  }
  return !isDebugSuppressed(namespace);
}

function createLogFn(level: LogLevel, namespace: string): (message: string, data?: LogData) => void {
  return (message: string, data?: LogData): void => {
    if (!shouldLog(level, namespace)) return;
    const prefix = `[${namespace}]`;
    // Looked up per call so test spies on `console` take effect.
    if (data !== undefined) {
      console[CONSOLE_METHOD[level]](prefix, message, data);
    } else {
      console[CONSOLE_METHOD[level]](prefix, message);
    }
  };
}

/**
 * Flatten an unknown thrown value into log data.
 *
 * Stack traces belong in operator logs only; HTTP payloads carry the
 * message alone.
 */
export function errorData(err: unknown): LogData {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  return { error: String(err) };
}

/**
 * Create a namespaced {@link Logger} instance.
 *
 * Each method prefixes output with `[namespace]` and optionally appends a
 * structured data object.
 *
 * @example
 * const log = logger('rooms');
 * log.info('room created', { code: 'K7QX2M' });
 */
export function logger(namespace: string): Logger {
  return {
    debug: createLogFn('debug', namespace),
    info: createLogFn('info', namespace),
    warn: createLogFn('warn', namespace),
    error: createLogFn('error', namespace),
  };
}
