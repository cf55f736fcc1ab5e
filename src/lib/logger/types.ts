/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important/higher priority
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS (routine operational info)
  DEBUG = 4,
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'warn'
  | 'notice'
  | 'success'
  | 'info'
  | 'debug'
  | 'raw';

/**
 * Maps a LogType to its corresponding LogLevel
 */
export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

/**
 * Names accepted in configuration and environment variables
 */
export const LOG_LEVEL_NAMES = [
  'error',
  'warn',
  'notice',
  'info',
  'debug',
] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export function logLevelFromName(name: LogLevelName): LogLevel {
  return getLogLevel(name);
}

/**
 * Options for log methods
 */
export interface LogOptions {
  exitCode?: number;
  params?: Record<string, unknown>;
  tags?: string[];
  redactedKeys?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'lifecycle', 'pipeline'
  entityName?: string; // e.g. a binding or a stage name
  template: string; // "Stopping instance {{instanceID}}"
  message: string; // "Stopping instance 4242"
  params?: Record<string, unknown>;
  redactedParams?: Record<string, unknown>;
  redactedKeys?: string[];
  error?: unknown; // from errorObject() calls
  exitCode?: number;
  tags?: string[];
}

/**
 * Sink interface - all sinks must implement this
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type RedactFunction = (keyName: string, value: unknown) => unknown;

/**
 * Receives a log entry and returns either a transformed entry or false to keep the original.
 */
export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export interface LoggerOptions {
  sinks?: LogSink[];
  redactFunction?: RedactFunction;

  /** When false, `exitCode` logs close the sinks but leave the process running */
  callProcessExit?: boolean;

  onSinkError?: (
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ) => void;
}
