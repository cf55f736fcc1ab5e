import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

/**
 * Where formatted lines go. Progress goes to `out`, warnings and errors to
 * `err`.
 */
export interface ConsoleOutput {
  out(line: string): void;
  err(line: string): void;
}

export const processOutput: ConsoleOutput = {
  out: (line) => {
    process.stdout.write(line + '\n');
  },
  err: (line) => {
    process.stderr.write(line + '\n');
  },
};

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  minLevel?: LogLevel;
  output?: ConsoleOutput;
}

export function formatConsoleLine(
  entry: LogEntry,
  options: { timestamps: boolean; typeLabels: boolean },
): string {
  let line = '';

  if (options.timestamps) {
    line = `[${format(entry.timestamp, 'HH:mm:ss')}] `;
  }

  if (options.typeLabels) {
    line += `[${entry.type.toUpperCase()}] `;
  }

  if (entry.serviceName) {
    line += `[${entry.serviceName}] `;
  }

  if (entry.entityName) {
    line += `[${entry.entityName}] `;
  }

  return line + entry.message;
}

/**
 * Terminal sink for the CLI. Raw entries (tables, usage text) are written
 * as they are and ignore the level filter.
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private minLevel: LogLevel;
  private output: ConsoleOutput;
  private closed = false;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.output = options.output ?? processOutput;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    if (entry.type === 'raw') {
      this.output.out(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const line = formatConsoleLine(entry, {
      timestamps: this.timestamps,
      typeLabels: this.typeLabels,
    });
    const text = this.colors ? colorize(entry.type, line) : line;

    if (entry.type === 'error' || entry.type === 'warn') {
      this.output.err(text);
    } else {
      this.output.out(text);
    }
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public close(): void {
    this.closed = true;
  }
}
