import { promises as fsPromises } from 'fs';
import path from 'path';
import type { LogEntry, LogSink } from '../types';

export interface FileSinkOptions {
  filePath: string;
}

/**
 * Error raised by FileSink writes, wrapping the underlying fs error
 */
export class FileSinkError extends Error {
  public errPrefix = 'FileSinkErr';
  public errType = 'FileSink';
  public errCode = 'WriteFailed';
  public additionalInfo: { filePath: string };
  public cause?: unknown;

  constructor(additionalInfo: { filePath: string }, cause?: unknown) {
    super(`Failed to write log file "${additionalInfo.filePath}"`);
    this.name = 'FileSinkError';
    this.additionalInfo = additionalInfo;
    this.cause = cause;
  }
}

export function formatFileLine(entry: LogEntry): string {
  let line = `[${new Date(entry.timestamp).toISOString()}] [${entry.type.toUpperCase()}]`;

  if (entry.serviceName) {
    line += ` [${entry.serviceName}]`;
  }

  if (entry.entityName) {
    line += ` [${entry.entityName}]`;
  }

  return `${line} ${entry.message}`;
}

/**
 * FileSink appends one line per entry to a single file. Writes are queued
 * so lines land in call order; `close()` waits for the queue to drain.
 * Used for per-run pipeline logs.
 */
export class FileSink implements LogSink {
  public readonly filePath: string;
  private queue: Promise<void>;
  private closed = false;

  constructor(options: FileSinkOptions) {
    this.filePath = options.filePath;
    // a directory that can't be created surfaces as an appendFile failure
    this.queue = fsPromises
      .mkdir(path.dirname(this.filePath), { recursive: true })
      .then(
        () => undefined,
        () => undefined,
      );
  }

  public write(entry: LogEntry): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    const line = formatFileLine(entry) + '\n';

    const write = this.queue.then(() =>
      fsPromises.appendFile(this.filePath, line, 'utf8'),
    );

    // keep the chain alive after a failed write; the failure itself is
    // returned to the caller
    this.queue = write.catch(() => undefined);

    return write.catch((error: unknown) => {
      throw new FileSinkError({ filePath: this.filePath }, error);
    });
  }

  public async close(): Promise<void> {
    this.closed = true;
    await this.queue;
  }
}
