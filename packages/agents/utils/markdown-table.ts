// Markdown pipe tables — parse model output into rows, render rows back

export interface ParsedTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

function splitRow(line: string): string[] {
  const inner = line.trim().replace(/^\|/, '').replace(/\|$/, '');
  return inner.split('|').map((cell) => cell.trim());
}

function isSeparator(line: string): boolean {
  return /^\s*\|?\s*:?-{2,}:?\s*(\|\s*:?-{2,}:?\s*)*\|?\s*$/.test(line);
}

/** Parse the first pipe table in `text`; null when none is present. */
export function parseMarkdownTable(text: string): ParsedTable | null {
  const lines = text.split('\n');
  for (let i = 0; i < lines.length - 1; i++) {
    if (!lines[i].includes('|') || !isSeparator(lines[i + 1])) continue;

    const columns = splitRow(lines[i]);
    const rows: Array<Record<string, string>> = [];
    for (let j = i + 2; j < lines.length && lines[j].includes('|'); j++) {
      const cells = splitRow(lines[j]);
      const row: Record<string, string> = {};
      columns.forEach((col, idx) => {
        row[col] = cells[idx] ?? '';
      });
      rows.push(row);
    }
    return { columns, rows };
  }
  return null;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function renderMarkdownTable(columns: readonly string[], rows: ReadonlyArray<Record<string, string>>): string {
  const header = `| ${columns.map(escapeCell).join(' | ')} |`;
  const sep = `| ${columns.map(() => '---').join(' | ')} |`;
  const body = rows.map((row) => `| ${columns.map((col) => escapeCell(row[col] ?? '')).join(' | ')} |`);
  return [header, sep, ...body].join('\n');
}
