/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF or LF rows.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && input[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter(r => r.some(cell => cell.trim().length > 0));
}

/**
 * Rows keyed by header. Header names are trimmed and lower-cased, values trimmed;
 * cells missing from short rows are empty strings.
 */
export function parseCsvRecords(text: string): Array<Record<string, string>> {
  const [header, ...body] = parseCsv(text);
  if (!header) {
    return [];
  }
  const keys = header.map(h => h.trim().toLowerCase());

  return body.map(cells => {
    const record: Record<string, string> = {};
    keys.forEach((key, i) => {
      if (key) record[key] = (cells[i] ?? '').trim();
    });
    return record;
  });
}
