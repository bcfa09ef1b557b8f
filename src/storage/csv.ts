/**
 * Minimal CSV codec: comma separated, double-quote escaping, LF row terminator
 */

const NEEDS_QUOTING = /[",\r\n]/;

export function encodeField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

export function encodeRow(fields: string[]): string {
  return fields.map(encodeField).join(',') + '\n';
}

/**
 * Split CSV text into rows of fields. Blank lines are dropped. An unterminated
 * quoted field runs to the end of the input.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowStarted = false;

  const endRow = (): void => {
    row.push(field);
    if (!(row.length === 1 && row[0] === '')) {
      rows.push(row);
    }
    row = [];
    field = '';
    rowStarted = false;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
      rowStarted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      rowStarted = true;
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (content[i + 1] !== '\n') {
        endRow();
      }
    } else {
      field += char;
      rowStarted = true;
    }
  }

  if (rowStarted || field !== '') {
    endRow();
  }

  return rows;
}
