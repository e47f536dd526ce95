import fs from 'node:fs';

export interface CsvTable {
  headers: string[];
  rows: Record<string, string>[];
}

const BOM = '\uFEFF';

/**
 * Parses CSV text into rows of raw cells. Cell values are returned as written,
 * whitespace included; only lines with no content at all are dropped.
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let current = '';
  let currentRow: string[] = [];
  let inQuotes = false;

  for (let i = 0; i < source.length; i += 1) {
    const char = source[i];

    if (char === '"') {
      const nextChar = source[i + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }

    if (char === ',' && !inQuotes) {
      currentRow.push(current);
      current = '';
      continue;
    }

    if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && source[i + 1] === '\n') {
        i += 1;
      }
      currentRow.push(current);
      rows.push(currentRow);
      current = '';
      currentRow = [];
      continue;
    }

    current += char;
  }

  if (currentRow.length > 0 || current) {
    currentRow.push(current);
    rows.push(currentRow);
  }

  return rows.filter((row) => row.some((cell) => cell.length > 0));
}

export function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(headers: readonly string[], rows: string[][]): string {
  const headerLine = headers.map((header) => escapeCsv(header)).join(',');
  const body = rows.map((row) => row.map((cell) => escapeCsv(cell ?? '')).join(',')).join('\n');
  const content = body ? `${headerLine}\n${body}` : headerLine;
  return `${BOM}${content}\n`;
}

export function toCsvTable(table: string[][]): CsvTable {
  const [headerRow = [], ...dataRows] = table;
  const headers = [...headerRow];
  const rows = dataRows.map((row) =>
    headers.reduce<Record<string, string>>((acc, header, index) => {
      acc[header] = row[index] ?? '';
      return acc;
    }, {}),
  );
  return { headers, rows };
}

export function readCsvFile(file: string): CsvTable {
  return toCsvTable(parseCsv(fs.readFileSync(file, 'utf8')));
}

export function writeCsvFile(file: string, headers: readonly string[], rows: string[][]): void {
  fs.writeFileSync(file, stringifyCsv(headers, rows), 'utf8');
}
