export class CsvParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = 'CsvParseError';
  }
}

/**
 * RFC 4180 reader: quoted fields may contain commas, doubled quotes and line
 * breaks. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let quoteStartLine = 1;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  for (let index = 0; index < input.length; index += 1) {
    const char = input.charAt(index);

    if (inQuotes) {
      if (char === '"') {
        if (input.charAt(index + 1) === '"') {
          field += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') {
          line += 1;
        }
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      inQuotes = true;
      quoteStartLine = line;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && input.charAt(index + 1) === '\n') {
        index += 1;
      }
      endRow();
      line += 1;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', quoteStartLine);
  }
  if (field.length > 0 || row.length > 0) {
    endRow();
  }

  return rows;
}
