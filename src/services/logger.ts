/**
 * CLI logger - winston with every level on stderr,
 * so stdout only carries the request audit trail
 */

import { createLogger, format, transports, Logger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface CliLoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  return createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(
      format.splat(),
      format.printf(({ level, message }) => `${level}: ${message}`)
    ),
    transports: [
      new transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });
}

export function logLevelFor(flags: { quiet?: boolean; verbose?: boolean }): LogLevel {
  if (flags.quiet) return 'error';
  if (flags.verbose) return 'debug';
  return 'info';
}
