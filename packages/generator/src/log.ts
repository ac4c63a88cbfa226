import pc from 'picocolors';
import type { LogLevel } from '@lookform/core';

// ── Logger ──────────────────────────────────────────────────────────

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogWriter = (line: string) => void;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Defaults to console.log. */
  readonly write?: LogWriter;
}

export function createLogger(options?: LoggerOptions): Logger {
  const threshold = LEVEL_RANK[options?.level ?? 'info'];
  const write: LogWriter = options?.write ?? ((line) => console.log(line));

  const at = (level: LogLevel, line: string): void => {
    if (LEVEL_RANK[level] >= threshold) write(line);
  };

  return {
    debug: (message) => at('debug', pc.dim(message)),
    info: (message) => at('info', message),
    success: (message) => at('info', pc.green(message)),
    warn: (message) => at('warn', pc.yellow(`Warning: ${message}`)),
    error: (message) => at('error', pc.red(`Error: ${message}`)),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: 'error', write: () => {} });
