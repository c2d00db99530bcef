/**
 * Observability Module
 *
 * Default implementations of the Logger and Metrics interfaces. The console
 * logger writes one JSON line per entry so log collectors can parse it;
 * metrics default to a no-op so a deployment can plug in its own backend.
 */

import type { Logger, Metrics } from '../types/index.js';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

function write(level: LogLevel, module: string, message: string, meta?: Record<string, unknown>): void {
  const line = JSON.stringify({ level, module, message, ...meta, timestamp: new Date().toISOString() });
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Console logger tagged with the emitting module
 */
export function createConsoleLogger(module: string): Logger {
  return {
    info: (message, meta) => write('info', module, message, meta),
    warn: (message, meta) => write('warn', module, message, meta),
    error: (message, meta) => write('error', module, message, meta),
    debug: (message, meta) => write('debug', module, message, meta),
  };
}

export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
