import { describe, expect, test } from 'vitest';
import { ConsoleSink, formatConsoleLine } from './console';
import type { ConsoleOutput } from './console';
import type { LogEntry } from '../types';
import { LogLevel } from '../types';

const makeEntry = (overrides: Partial<LogEntry>): LogEntry => ({
  timestamp: new Date(2024, 4, 1, 9, 30, 5).getTime(),
  type: 'info',
  template: 'Test message',
  message: 'Test message',
  ...overrides,
});

function recordingOutput() {
  const out: string[] = [];
  const err: string[] = [];
  const output: ConsoleOutput = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };

  return { output, out, err };
}

describe('ConsoleSink', () => {
  test('sends warnings and errors to err, everything else to out', () => {
    const { output, out, err } = recordingOutput();
    const sink = new ConsoleSink({ colors: false, output });

    sink.write(makeEntry({ type: 'info', message: 'i' }));
    sink.write(makeEntry({ type: 'error', message: 'e' }));
    sink.write(makeEntry({ type: 'warn', message: 'w' }));
    sink.write(makeEntry({ type: 'success', message: 's' }));

    expect(out).toEqual(['i', 's']);
    expect(err).toEqual(['e', 'w']);
  });

  test('prefixes type labels, service and entity names', () => {
    const { output, err } = recordingOutput();
    const sink = new ConsoleSink({ colors: false, typeLabels: true, output });

    sink.write(
      makeEntry({
        type: 'warn',
        serviceName: 'pipeline',
        entityName: 'static-check',
        message: 'lint failed',
      }),
    );

    expect(err).toEqual(['[WARN] [pipeline] [static-check] lint failed']);
  });

  test('filters entries below the minimum level', () => {
    const { output, out } = recordingOutput();
    const sink = new ConsoleSink({ colors: false, output });

    sink.write(makeEntry({ type: 'debug', message: 'hidden' }));
    expect(out).toEqual([]);

    sink.setMinLevel(LogLevel.DEBUG);
    expect(sink.getMinLevel()).toBe(LogLevel.DEBUG);
    sink.write(makeEntry({ type: 'debug', message: 'shown' }));
    expect(out).toEqual(['shown']);
  });

  test('raw entries bypass formatting and level filtering', () => {
    const { output, out } = recordingOutput();
    const sink = new ConsoleSink({ minLevel: LogLevel.ERROR, output });

    sink.write(makeEntry({ type: 'raw', serviceName: 'x', message: 'raw' }));

    expect(out).toEqual(['raw']);
  });

  test('a closed sink writes nothing', () => {
    const { output, out } = recordingOutput();
    const sink = new ConsoleSink({ output });

    sink.close();
    sink.write(makeEntry({}));

    expect(out).toEqual([]);
  });
});

describe('formatConsoleLine', () => {
  test('renders the local time when timestamps are on', () => {
    expect(
      formatConsoleLine(makeEntry({ serviceName: 'cli' }), {
        timestamps: true,
        typeLabels: false,
      }),
    ).toBe('[09:30:05] [cli] Test message');
  });
});
