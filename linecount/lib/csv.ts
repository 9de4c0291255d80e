/**
 * CSV Row Splitting
 *
 * Comma-separated fields, double-quote quoting with "" escapes. A quote
 * only opens a quoted field at the start of that field; elsewhere it is
 * literal text. Quoted fields may contain commas and line breaks.
 * Rows end at \n, \r\n or \r. No header row is assumed.
 */

/**
 * Split CSV text into rows of raw (untrimmed) fields.
 *
 * A blank line is returned as a row with one empty field. A line break at
 * the very end of the text does not start another row.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
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

    if (ch === '"' && field === '') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === ',') {
      endField();
      rowHasContent = true;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      endRow();
    } else {
      field += ch;
      rowHasContent = true;
    }
  }

  if (rowHasContent || field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}
