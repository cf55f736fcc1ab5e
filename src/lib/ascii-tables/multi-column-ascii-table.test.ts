import { describe, expect, test } from 'vitest';
import { MultiColumnASCIITable } from './multi-column-ascii-table';

describe('MultiColumnASCIITable', () => {
  test('should render headers and rows', () => {
    const table = new MultiColumnASCIITable(['Stage', 'Outcome']);

    table.addRow(['build', 'success']);
    table.addRow(['test', 'failure']);

    expect(table.toString()).toBe(
      [
        '+=================+',
        '| Stage | Outcome |',
        '+-----------------+',
        '| build | success |',
        '+-----------------+',
        '| test  | failure |',
        '+=================+',
      ].join('\n'),
    );
  });

  test('should render the empty message when there are no rows', () => {
    const table = new MultiColumnASCIITable(['Stage', 'Outcome'], {
      emptyMessage: 'No stages',
    });

    expect(table.toString()).toBe(
      [
        '+=================+',
        '| Stage | Outcome |',
        '+-----------------+',
        '| No stages       |',
        '+=================+',
      ].join('\n'),
    );
  });

  test('should shrink and truncate to fit the table width', () => {
    const table = new MultiColumnASCIITable(['Name', 'Detail'], {
      tableWidth: 20,
    });

    table.addRow(['a', 'abcdefghijklmnopqrstuvwxyz']);

    const lines = table.toString().split('\n');

    expect(lines[3]).toBe('| a    | abcdefgh… |');
    for (const line of lines) {
      expect(line.length).toBeLessThanOrEqual(20);
    }
  });

  test('should reject rows with the wrong number of cells', () => {
    const table = new MultiColumnASCIITable(['One', 'Two']);

    expect(() => table.addRow(['only one'])).toThrow(
      'Number of values in the row (1) must match the number of headers (2).',
    );
  });

  test('should reject widths that cannot fit the headers', () => {
    expect(() => new MultiColumnASCIITable(['A', 'B'], { tableWidth: 5 })).toThrow(
      'Table width must be at least 13 to accommodate the headers.',
    );
  });
});
