import stringWidth from 'string-width';

export interface MultiColumnASCIITableOptions {
  tableWidth?: number;
  emptyMessage?: string;
}

const MIN_COLUMN_WIDTH = 3;
const ELLIPSIS = '…';

function padRight(text: string, width: number): string {
  return text + ' '.repeat(Math.max(width - stringWidth(text), 0));
}

function truncate(text: string, width: number): string {
  if (stringWidth(text) <= width) {
    return text;
  }

  let result = '';

  for (const char of Array.from(text)) {
    if (stringWidth(result + char) > width - 1) {
      break;
    }

    result += char;
  }

  return result + ELLIPSIS;
}

/**
 * Fixed-header table for terminal summaries, e.g. the stage list of a
 * pipeline run. Columns shrink (widest first) to fit `tableWidth`, and
 * cells that still don't fit are cut with an ellipsis.
 *
 * ```
 * +==================+
 * | Stage  | Outcome |
 * +------------------+
 * | build  | success |
 * +==================+
 * ```
 */
export class MultiColumnASCIITable {
  private headers: string[];
  private rows: string[][] = [];
  private tableWidth: number;
  private emptyMessage: string;

  constructor(headers: string[], options: MultiColumnASCIITableOptions = {}) {
    if (headers.length === 0) {
      throw new Error('A table needs at least one header.');
    }

    this.headers = headers;
    this.tableWidth = options.tableWidth ?? 80;
    this.emptyMessage = options.emptyMessage ?? '';

    const minTableWidth = this.getMinimumWidth();

    if (this.tableWidth < minTableWidth) {
      throw new Error(
        `Table width must be at least ${minTableWidth} to accommodate the headers.`,
      );
    }
  }

  public getMinimumWidth(): number {
    return this.headers.length * (MIN_COLUMN_WIDTH + 3) + 1;
  }

  public addRow(row: string[]): void {
    if (row.length !== this.headers.length) {
      throw new Error(
        `Number of values in the row (${row.length}) must match the number of headers (${this.headers.length}).`,
      );
    }

    this.rows.push(row);
  }

  public calculateColumnWidths(): number[] {
    const widths = this.headers.map((header, index) =>
      Math.max(
        MIN_COLUMN_WIDTH,
        stringWidth(header),
        ...this.rows.map((row) => stringWidth(row[index] ?? '')),
      ),
    );

    const totalWidth = (): number =>
      widths.reduce((sum, width) => sum + width + 3, 0) + 1;

    while (totalWidth() > this.tableWidth) {
      const widest = widths.indexOf(Math.max(...widths));

      if (widths[widest] <= MIN_COLUMN_WIDTH) {
        break;
      }

      widths[widest] -= 1;
    }

    return widths;
  }

  public toString(): string {
    const widths = this.calculateColumnWidths();
    const innerWidth = widths.reduce((sum, width) => sum + width + 3, 0) - 1;
    const outerSeparator = `+${'='.repeat(innerWidth)}+`;
    const rowSeparator = `+${'-'.repeat(innerWidth)}+`;

    const lines = [outerSeparator, this.renderRow(this.headers, widths)];

    if (this.rows.length === 0) {
      lines.push(rowSeparator);
      lines.push(
        `| ${padRight(truncate(this.emptyMessage, innerWidth - 2), innerWidth - 2)} |`,
      );
    }

    for (const row of this.rows) {
      lines.push(rowSeparator);
      lines.push(this.renderRow(row, widths));
    }

    lines.push(outerSeparator);

    return lines.join('\n');
  }

  private renderRow(cells: string[], widths: number[]): string {
    const rendered = cells.map((cell, index) =>
      padRight(truncate(cell, widths[index]), widths[index]),
    );

    return `| ${rendered.join(' | ')} |`;
  }
}
