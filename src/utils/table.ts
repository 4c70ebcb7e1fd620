/**
 * Table Formatting Utility
 *
 * Renders metric rows as box-drawn text tables. Numeric cells are printed
 * with a fixed number of decimals so scores line up.
 */

import chalk from 'chalk';

/**
 * Column alignment options
 */
export type Alignment = 'left' | 'right' | 'center';

/**
 * Column definition for table
 */
export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left for text, right for numbers) */
  align?: Alignment;
  /** Decimals used for numeric cells (default: 3) */
  decimals?: number;
}

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, string | number | null | undefined>;

const DEFAULT_DECIMALS = 3;

// Box-drawing characters
const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeDown: '┬',
  teeUp: '┴',
  teeRight: '├',
  teeLeft: '┤',
  cross: '┼',
} as const;

/**
 * Strip ANSI escape codes (for width calculation)
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = width - stripAnsi(str).length;
  if (padding <= 0) return str;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + str + ' '.repeat(padding - left);
    }
    case 'left':
    default:
      return str + ' '.repeat(padding);
  }
}

/**
 * Render one cell value. Numbers get fixed decimals, null/undefined render empty.
 */
export function formatCell(
  value: string | number | null | undefined,
  decimals: number = DEFAULT_DECIMALS
): string {
  if (value == null) return '';
  if (typeof value === 'number') return value.toFixed(decimals);
  return value;
}

/**
 * Format rows as a box-drawn table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Metric', key: 'metric' }, { header: 'Value', key: 'value' }],
 *   [{ metric: 'MRR', value: 0.75 }],
 * );
 * ```
 *
 * Output:
 * ```
 * ┌────────┬───────┐
 * │ Metric │ Value │
 * ├────────┼───────┤
 * │ MRR    │ 0.750 │
 * └────────┴───────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) =>
    columns.map((col) => formatCell(row[col.key], col.decimals))
  );

  const widths = columns.map((col, i) =>
    cells.reduce(
      (max, rowCells) => Math.max(max, stripAnsi(rowCells[i] ?? '').length),
      col.header.length
    )
  );

  // Numeric columns default to right alignment
  const alignments = columns.map((col): Alignment => {
    if (col.align) return col.align;
    return rows.some((row) => typeof row[col.key] === 'number') ? 'right' : 'left';
  });

  const hLine = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => BOX.horizontal.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], isHeader: boolean): string => {
    const rendered = values.map((value, i) => {
      const padded = pad(value, widths[i] ?? 0, isHeader ? 'left' : alignments[i] ?? 'left');
      return ` ${isHeader ? chalk.bold(padded) : padded} `;
    });
    return BOX.vertical + rendered.join(BOX.vertical) + BOX.vertical;
  };

  return [
    hLine(BOX.topLeft, BOX.teeDown, BOX.topRight),
    line(columns.map((c) => c.header), true),
    hLine(BOX.teeRight, BOX.cross, BOX.teeLeft),
    ...cells.map((rowCells) => line(rowCells, false)),
    hLine(BOX.bottomLeft, BOX.teeUp, BOX.bottomRight),
  ].join('\n');
}
