import { CurlyBrackets } from '../curly-brackets';
import { isNumber, isPromise } from '../type-guards';
import type {
  LogEntry,
  LogSink,
  LogType,
  LoggerOptions,
  LogOptions,
  RedactFunction,
} from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import type { ConsoleSinkOptions } from './sinks/console';
import { applyRedaction } from './utils/redaction';
import { prepareErrorObjectLog } from './utils/error-object';
import { LoggerService } from './logger-service';

/**
 * Sink-based logger. Messages are `{{param}}` templates rendered against
 * `params`; every entry goes to every sink.
 */
export class Logger {
  private sinks: LogSink[];
  private redactFunction?: RedactFunction;
  private callProcessExit: boolean;
  private onSinkError?: LoggerOptions['onSinkError'];

  private _didExit = false;
  private _exitCode = 0;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    this.sinks = options.sinks ?? [];
    this.redactFunction = options.redactFunction;
    this.callProcessExit = options.callProcessExit ?? true;
    this.onSinkError = options.onSinkError;
  }

  public get exitCode(): number {
    return this._exitCode;
  }

  public get closed(): boolean {
    return this._closed;
  }

  /**
   * Close the sinks, then exit the process with `code` (unless
   * `callProcessExit` is false). Only the first call takes effect.
   */
  public exit(code: number): void {
    if (this._didExit) {
      return;
    }

    this._didExit = true;
    this._exitCode = code;

    void this.close().finally(() => {
      if (this.callProcessExit) {
        process.exit(code);
      }
    });
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, { ...options, error });
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Returns true if the sink was found and removed
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index !== -1) {
      this.sinks.splice(index, 1);
      return true;
    }

    return false;
  }

  /**
   * Close all sinks. After closing, the logger drops further entries.
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(error, 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];
  }

  /**
   * Create a logger optimized for testing.
   * Includes an ArraySink for log inspection; process exit is disabled.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    arrayLogTransformer?: (entry: LogEntry) => LogEntry | false;
  }): { logger: Logger; arraySink: ArraySink } {
    const arraySink = new ArraySink({
      transformer: options?.arrayLogTransformer,
    });

    return {
      logger: new Logger({
        sinks: [arraySink, ...(options?.sinks ?? [])],
        callProcessExit: false,
      }),
      arraySink,
    };
  }

  /**
   * Logger for the CLI entry point. Exits the process on `exit()`.
   */
  public static createCLILogger(options: ConsoleSinkOptions = {}): {
    logger: Logger;
    consoleSink: ConsoleSink;
  } {
    const consoleSink = new ConsoleSink(options);

    return { logger: new Logger({ sinks: [consoleSink] }), consoleSink };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const exitCode = options?.exitCode;
    const params = options?.params;
    const tags = options?.tags;
    const redactedKeys = options?.redactedKeys;

    // Templates render against the redacted params so secrets never reach a sink
    const redactedParams = params
      ? applyRedaction(params, redactedKeys, this.redactFunction)
      : undefined;
    const message = redactedParams
      ? CurlyBrackets(template, redactedParams)
      : template;

    const entry: LogEntry = {
      timestamp: Date.now(),
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message,
      params,
      redactedParams,
      redactedKeys:
        params && redactedKeys && redactedKeys.length > 0
          ? redactedKeys
          : undefined,
      error: options?.error,
      exitCode: isNumber(exitCode) ? exitCode : undefined,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.then(undefined, (error: unknown) => {
            this.handleSinkError(error, 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(error, 'write', sink);
      }
    }

    if (isNumber(exitCode)) {
      this.exit(exitCode);
    }
  }

  /**
   * Handle sink errors by calling the onSinkError callback or falling back to console.error
   */
  private handleSinkError(
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    const message = error instanceof Error ? error.message : String(error);

    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
      } catch {
        // eslint-disable-next-line no-console
        console.error(`Error in onSinkError handler: ${message}`);
      }
    } else {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${message}`,
      );
    }
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
