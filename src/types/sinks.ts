/**
 * External collaborator interfaces: structured logging and alerting.
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogContext = Record<string, unknown>;

export interface LogSink {
  log(level: LogLevel, message: string, context?: LogContext): void;
}

export const ALERT_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type AlertSeverity = typeof ALERT_SEVERITIES[number];

export interface AlertSink {
  notify(severity: AlertSeverity, title: string, message: string, context?: LogContext): void | Promise<void>;
}
