/**
 * gitlatch type definitions.
 */

export type {
  GitlatchConfig,
  GitlatchConfigFile,
  LockConfig,
  RetryConfig,
  OperationOverrides,
  GitConfig,
  LoggingConfig,
  AlertsConfig,
} from './config.js';

export type { OperationName, LockToken, LockRecord, AcquireResult } from './lock.js';
export { OPERATION_NAMES, isOperationName } from './lock.js';

export type {
  CommandSpec,
  AttemptStatus,
  AttemptResult,
  RetryPolicy,
  RetryResult,
  OperationOutcome,
} from './outcome.js';

export type { LogLevel, LogContext, LogSink, AlertSeverity, AlertSink } from './sinks.js';
export { LOG_LEVELS, ALERT_SEVERITIES } from './sinks.js';
