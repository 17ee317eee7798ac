/**
 * CSV Parser
 *
 * RFC-4180 reader/writer for bank and export files: quoted fields may hold
 * the delimiter, doubled quotes and line breaks. Structure only; column
 * meaning belongs to bank-parser.ts.
 */

export interface CsvRow {
  /** 1-based line on which the row starts */
  line: number;
  fields: string[];
}

const BOM = '\uFEFF';

export function stripBom(content: string): string {
  return content.startsWith(BOM) ? content.slice(1) : content;
}

/**
 * Split CSV text into rows of raw field values
 */
export function parseCsv(content: string, delimiter = ','): CsvRow[] {
  const text = stripBom(content);
  const rows: CsvRow[] = [];

  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;
  let i = 0;

  const endRow = () => {
    fields.push(field);
    rows.push({ line: rowStart, fields });
    fields = [];
    field = '';
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(field);
      field = '';
    } else if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowStart = line;
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== '' || fields.length > 0 || inQuotes) {
    endRow();
  }

  return rows;
}

function quoteField(value: string, delimiter: string): string {
  if (value.includes('"') || value.includes(delimiter) || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly (string | number | boolean)[], delimiter = ','): string {
  return fields.map(value => quoteField(String(value), delimiter)).join(delimiter);
}

/**
 * Serialize rows with CRLF line endings and an optional BOM
 */
export function formatCsv(
  rows: readonly (readonly (string | number | boolean)[])[],
  options: { delimiter?: string; bom?: boolean } = {}
): string {
  const body = rows.map(row => formatCsvRow(row, options.delimiter ?? ',')).join('\r\n');
  return `${options.bom ? BOM : ''}${body}\r\n`;
}

/**
 * True for a row that carries no data (empty line)
 */
export function isBlankRow(row: CsvRow): boolean {
  return row.fields.every(field => field.trim() === '');
}
