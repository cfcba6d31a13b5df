/**
 * Logger - electron-log configured for plain Node.js
 *
 * Every component logs through its own scope so lines read
 * `[Orchestrator] State: idle -> capturing`. The console shows warnings and
 * errors (everything with --verbose); the file transport keeps a rotating
 * info-level log under the voxrelay home directory.
 */

import log from 'electron-log/node';
import { join } from 'path';
import { homedir } from 'os';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ScopedLogger {
  error(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  info(...params: unknown[]): void;
  debug(...params: unknown[]): void;
}

const MAX_LOG_SIZE_BYTES = 5 * 1024 * 1024; // 5MB

/** Console level without --verbose; the CLI prints its own progress lines. */
export const DEFAULT_CONSOLE_LEVEL: LogLevel = 'warn';
export const VERBOSE_CONSOLE_LEVEL: LogLevel = 'debug';

/**
 * Resolve the voxrelay home directory (settings, logs, temp audio).
 * VOXRELAY_HOME overrides the default ~/.voxrelay.
 */
export function getVoxrelayHome(): string {
  const override = process.env.VOXRELAY_HOME;
  if (override && override.trim().length > 0) {
    return override;
  }
  const home = process.env.HOME || process.env.USERPROFILE || homedir();
  return join(home, '.voxrelay');
}

let configured = false;

/**
 * Apply transport settings. Safe to call more than once; later calls only
 * adjust the console level.
 */
export function configureLogging(options: { verbose?: boolean; file?: boolean } = {}): void {
  log.transports.console.level = options.verbose ? VERBOSE_CONSOLE_LEVEL : DEFAULT_CONSOLE_LEVEL;

  if (configured) return;
  configured = true;

  if (options.file === false) {
    log.transports.file.level = false;
    return;
  }

  log.transports.file.level = 'info';
  log.transports.file.maxSize = MAX_LOG_SIZE_BYTES;
  log.transports.file.resolvePathFn = () => join(getVoxrelayHome(), 'logs', 'voxrelay.log');
}

/**
 * Create a logger bound to a component name.
 */
export function createLogger(scope: string): ScopedLogger {
  return log.scope(scope);
}

export default log;
