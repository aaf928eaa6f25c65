/**
 * Console-backed log and alert sinks.
 *
 * Everything goes to stderr so stdout stays reserved for command results.
 */

import type { AlertSeverity, AlertSink, LogContext, LogLevel, LogSink } from '../types/sinks.js';
import { LOG_LEVELS } from '../types/sinks.js';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const LOG_LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_SET.has(value);
}

/**
 * Formats one log line: `[LEVEL] message {"key":"value"}`.
 */
export function formatLogLine(level: LogLevel, message: string, context?: LogContext): string {
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${level}] ${message}${suffix}`;
}

export class ConsoleLogSink implements LogSink {
  constructor(private readonly minLevel: LogLevel = 'INFO') {}

  log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    console.error(formatLogLine(level, message, context));
  }
}

/** Drops everything. */
export const nullLogSink: LogSink = {
  log: () => undefined,
};

const SEVERITY_LEVEL: Readonly<Record<AlertSeverity, LogLevel>> = {
  low: 'INFO',
  medium: 'WARN',
  high: 'ERROR',
  critical: 'ERROR',
};

/**
 * Alert sink that records alerts on the log sink.
 *
 * Delivery to paging or chat systems lives outside this package; callers
 * that have one pass their own AlertSink instead.
 */
export function createLogAlertSink(logger: LogSink): AlertSink {
  return {
    notify(severity: AlertSeverity, title: string, message: string, context?: LogContext): void {
      logger.log(SEVERITY_LEVEL[severity], `ALERT(${severity}) ${title}: ${message}`, context);
    },
  };
}
