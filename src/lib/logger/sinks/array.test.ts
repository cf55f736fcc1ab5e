import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

const entry = (message: string, entityName?: string): LogEntry => ({
  timestamp: 0,
  type: 'info',
  template: message,
  message,
  entityName,
});

describe('ArraySink', () => {
  test('should store entries', () => {
    const sink = new ArraySink();

    sink.write(entry('one'));
    sink.write(entry('two', 'checkout'));

    expect(sink.getSnapshotFriendlyLogs()).toEqual(['info: one', 'info: two']);
    expect(sink.messagesFor('checkout')).toEqual(['two']);
  });

  test('should apply the transformer unless it returns false', () => {
    const sink = new ArraySink({
      transformer: (log) =>
        log.message === 'keep' ? false : { ...log, message: 'changed' },
    });

    sink.write(entry('keep'));
    sink.write(entry('other'));

    expect(sink.logs.map((log) => log.message)).toEqual(['keep', 'changed']);
  });

  test('should ignore writes after close and support clear', () => {
    const sink = new ArraySink();

    sink.write(entry('one'));
    sink.clear();
    sink.close();
    sink.write(entry('two'));

    expect(sink.logs).toEqual([]);
  });
});
