import type { LogOptions, LogType } from './types';
import type { HandleLogFunction } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * LoggerService for scoped logging with a service name and, optionally, an
 * entity name (a binding, a stage)
 */
export class LoggerService {
  private handleLog: HandleLogFunction;
  private serviceName: string;
  private entityName?: string;

  constructor(
    handleLog: HandleLogFunction,
    serviceName: string,
    entityName?: string,
  ) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Derive a logger that tags every entry with `entityName`
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(
    prefix: string,
    error: unknown,
    options?: LogOptions,
  ): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  private log(type: LogType, message: string, options?: LogOptions): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
    });
  }
}
