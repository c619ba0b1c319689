/**
 * Table formatting for console reports
 */

const isColorSupported = (): boolean => {
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  return !!process.stdout.isTTY;
};

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  cyan: '\x1b[96m',
  gray: '\x1b[90m',
} as const;

export const colorize = (text: string, color: Exclude<keyof typeof colors, 'reset'>): string => {
  if (!isColorSupported()) return text;
  return `${colors[color]}${text}${colors.reset}`;
};

export interface TableColumn<Row> {
  title: string;
  value: (row: Row) => string;
  width?: number;
}

export interface TableConfig<Row> {
  columns: TableColumn<Row>[];
  data: readonly Row[];
  /** Box-drawing borders; plain mode left-justifies columns like a fixed-width report */
  border?: boolean;
  maxWidth?: number;
}

export const formatTable = <Row>(config: TableConfig<Row>): string[] => {
  const { columns, data, border = false, maxWidth = 160 } = config;
  const rows = data.map(row => columns.map(col => col.value(row)));

  const widths = columns.map((col, i) => {
    if (col.width) return col.width;
    const contentWidth = Math.max(col.title.length, ...rows.map(cells => cells[i].length));
    return border ? Math.min(contentWidth, Math.floor(maxWidth / columns.length) - 3) : contentWidth + 1;
  });

  if (!border) {
    // Last column is never padded
    const plainLine = (cells: string[]) =>
      cells.map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i]))).join('');
    return [plainLine(columns.map(col => col.title)), ...rows.map(plainLine)];
  }

  const formatCell = (content: string, width: number) =>
    (content.length > width ? content.substring(0, width - 3) + '...' : content).padEnd(width);
  const rule = (left: string, mid: string, right: string) =>
    left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right;
  const line = (cells: string[]) => '│ ' + cells.map((cell, i) => formatCell(cell, widths[i])).join(' │ ') + ' │';

  const lines = [rule('┌', '┬', '┐'), line(columns.map(col => col.title)), rule('├', '┼', '┤')];
  if (rows.length === 0) {
    lines.push('│ ' + 'No data available'.padEnd(widths.reduce((sum, w) => sum + w + 3, -3)) + ' │');
  }
  rows.forEach(cells => lines.push(line(cells)));
  lines.push(rule('└', '┴', '┘'));
  return lines;
};
