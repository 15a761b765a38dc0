export type CellValue = string | number | null;

export type ColumnAlign = 'left' | 'center';

export type PipeTableOptions = {
  headers: string[];
  rows: CellValue[][];
  align?: ColumnAlign;
  fractionDigits?: number;
};

function formatCell(value: CellValue, fractionDigits: number): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? 'nan' : value.toFixed(fractionDigits);
  }
  return value;
}

function pad(text: string, width: number, align: ColumnAlign): string {
  if (align === 'left') {
    return text.padEnd(width);
  }
  const total = width - text.length;
  if (total <= 0) {
    return text;
  }
  const left = Math.floor(total / 2);
  return ' '.repeat(left) + text + ' '.repeat(total - left);
}

/**
 * Markdown "pipe" table. Columns are at least two characters wider than
 * their header; numbers are printed with a fixed number of decimals.
 */
export function renderPipeTable({ headers, rows, align = 'left', fractionDigits = 3 }: PipeTableOptions): string {
  const formatted = rows.map(row => headers.map((_, index) => formatCell(row[index] ?? null, fractionDigits)));
  const widths = headers.map((header, index) =>
    Math.max(header.length + 2, ...formatted.map(row => row[index].length))
  );

  const line = (cells: string[]) =>
    `| ${cells.map((cell, index) => pad(cell, widths[index], align)).join(' | ')} |`;
  const separator = widths
    .map(width => (align === 'center' ? `:${'-'.repeat(width)}:` : `:${'-'.repeat(width + 1)}`))
    .join('|');

  return [line(headers), `|${separator}|`, ...formatted.map(line)].join('\n');
}

/** One-row table with the mapping's keys as headers. */
export function createSmallTable(values: Record<string, number>): string {
  return renderPipeTable({
    headers: Object.keys(values),
    rows: [Object.values(values)],
    align: 'center'
  });
}
