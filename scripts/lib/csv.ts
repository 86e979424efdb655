import { ProvisioningError } from './errors.js';

export interface CsvRow {
  /** 1-based line the row starts on. */
  line: number;
  values: string[];
}

export interface ParsedCsv {
  headerLine: number;
  headers: string[];
  rows: CsvRow[];
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function isBlankRow(values: string[]): boolean {
  return values.length === 1 && values[0].trim() === '';
}

/**
 * RFC 4180 reader: quoted fields may hold commas, newlines and "" escapes.
 * A quote opens a quoted section only as a field's first character; anywhere
 * else it is literal text. Blank lines are dropped; headers are trimmed,
 * values are returned as read.
 */
export function parseCsv(text: string, source = 'CSV input'): ParsedCsv {
  const normalized = stripBom(text).replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  const rows: CsvRow[] = [];

  let current: string[] = [];
  let field = '';
  let inQuotes = false;
  let atFieldStart = true;
  let line = 1;
  let rowStartLine = 1;
  let quoteStartLine = 1;

  const pushField = () => {
    current.push(field);
    field = '';
    atFieldStart = true;
  };

  const pushRow = () => {
    if (!isBlankRow(current)) {
      rows.push({ line: rowStartLine, values: current });
    }
    current = [];
  };

  for (let index = 0; index < normalized.length; index += 1) {
    const ch = normalized[index];

    if (ch === '"' && inQuotes) {
      if (normalized[index + 1] === '"') {
        field += '"';
        index += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === '"' && atFieldStart) {
      inQuotes = true;
      atFieldStart = false;
      quoteStartLine = line;
      continue;
    }

    if (ch === ',' && !inQuotes) {
      pushField();
      continue;
    }

    if (ch === '\n') {
      line += 1;
      if (!inQuotes) {
        pushField();
        pushRow();
        rowStartLine = line;
        continue;
      }
    }

    field += ch;
    atFieldStart = false;
  }

  if (inQuotes) {
    throw ProvisioningError.setup(
      'CSV_MALFORMED',
      `${source}:${quoteStartLine}: unterminated quoted field`
    );
  }

  pushField();
  pushRow();

  const header = rows.shift();
  return {
    headerLine: header?.line ?? 1,
    headers: (header?.values ?? []).map((value) => value.trim()),
    rows
  };
}
