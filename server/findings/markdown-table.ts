export type TableCell = string | number | null;

export interface StructuredTable {
  title?: string;
  columns: string[];
  rows: TableCell[][];
}

function escapeCell(cell: TableCell): string {
  if (cell === null) return '';
  return String(cell).replace(/\\/g, '\\\\').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ').trim();
}

/**
 * Render a row/column matrix to a GitHub-flavoured Markdown table. Short rows
 * are padded with empty cells; cells beyond the header width are dropped.
 */
export function renderMarkdownTable(table: StructuredTable): string {
  const width = table.columns.length;
  if (width === 0) return '';

  const line = (cells: string[]) => `| ${cells.join(' | ')} |`;
  const lines: string[] = [];

  if (table.title && table.title.trim()) {
    lines.push(`**${escapeCell(table.title)}**`, '');
  }
  lines.push(line(table.columns.map(escapeCell)));
  lines.push(line(table.columns.map(() => '---')));
  for (const row of table.rows) {
    const cells: string[] = [];
    for (let i = 0; i < width; i++) cells.push(escapeCell(row[i] ?? null));
    lines.push(line(cells));
  }
  return lines.join('\n');
}
