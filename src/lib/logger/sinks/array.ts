import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink stores logs in memory for testing and debugging
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    if (this.transformer) {
      const transformed = this.transformer(entry);

      if (transformed !== false) {
        this.logs.push(transformed);
        return;
      }
    }

    this.logs.push(entry);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Logs as `type: message` lines, handy for exact assertions
   */
  public getSnapshotFriendlyLogs(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  /**
   * Messages logged for one entity (e.g. one pipeline stage)
   */
  public messagesFor(entityName: string): string[] {
    return this.logs
      .filter((log) => log.entityName === entityName)
      .map((log) => log.message);
  }

  public close(): void {
    this.closed = true;
  }
}
