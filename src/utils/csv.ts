export interface CsvRow {
  /** 1-based data row number (the header is row 0). */
  row: number;
  cells: string[];
}

export interface CsvError {
  row: number;
  message: string;
}

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
  /** Records dropped because a quoted field never closes. */
  errors: CsvError[];
}

/**
 * Parse RFC 4180-style CSV: quoted fields may hold commas, doubled quotes and
 * line breaks. A leading BOM and CRLF line endings are accepted. A quote only
 * opens a quoted field as the field's first character; elsewhere it is text.
 */
export function parseCsv(text: string): CsvTable {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records: (string[] | null)[] = [];
  const errors: CsvError[] = [];
  let fields: string[] = [];
  let cur = "";
  let inQuotes = false;
  let quoteStart = -1;
  let fieldStarted = false;
  let started = false;

  const endField = () => {
    fields.push(cur);
    cur = "";
    fieldStarted = false;
  };
  const endRecord = () => {
    endField();
    records.push(fields);
    fields = [];
    started = false;
  };

  let i = 0;
  while (i < source.length || inQuotes) {
    if (i >= source.length) {
      // Unterminated quote: drop its record and resume on the line after the quote opened.
      errors.push({ row: records.length, message: "Unterminated quoted field; row skipped" });
      records.push(null);
      const newline = source.indexOf("\n", quoteStart);
      i = newline === -1 ? source.length : newline + 1;
      fields = [];
      cur = "";
      inQuotes = false;
      fieldStarted = false;
      started = false;
      continue;
    }

    const ch = source[i];
    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          cur += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        cur += ch;
      }
    } else if (ch === '"' && !fieldStarted) {
      inQuotes = true;
      quoteStart = i;
      fieldStarted = true;
      started = true;
    } else if (ch === ",") {
      endField();
      started = true;
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && source[i + 1] === "\n") i++;
      endRecord();
    } else {
      cur += ch;
      fieldStarted = true;
      started = true;
    }
    i++;
  }

  if (started || cur.length > 0) endRecord();

  const [header, ...body] = records;
  const rows: CsvRow[] = [];
  body.forEach((cells, index) => {
    if (cells) rows.push({ row: index + 1, cells });
  });

  return {
    header: (header ?? []).map((h) => h.trim()),
    rows,
    errors,
  };
}

/** True for rows with no content at all, including a trailing empty line. */
export function isBlankRow(cells: string[]): boolean {
  return cells.every((cell) => cell.trim().length === 0);
}

/** Split a comma-separated list cell into trimmed, non-empty items. */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
