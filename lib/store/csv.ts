/**
 * CSV encoding for the results store.
 *
 * Fields containing a comma, quote, CR or LF are wrapped in quotes with
 * embedded quotes doubled. Lines end with LF; CRLF is accepted when reading.
 */

export function escapeCsvValue(value: string | null | undefined): string {
  if (value === null || value === undefined) return "";
  const str = String(value);
  if (str.includes('"') || str.includes(",") || str.includes("\n") || str.includes("\r")) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * One CSV line, without the line terminator.
 */
export function formatCsvLine(values: string[]): string {
  // A lone empty field would otherwise be a blank line, which readers skip
  if (values.length === 1 && values[0] === "") return '""';
  return values.map(escapeCsvValue).join(",");
}

/**
 * Parse CSV text into records. Blank lines are skipped, a UTF-8 BOM is
 * dropped, and an unterminated quoted field runs to the end of the input.
 *
 * @param options.maxRecords Stop after this many records (e.g. 1 for the
 * header line)
 */
export function parseCsv(text: string, options: { maxRecords?: number } = {}): string[][] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const maxRecords = options.maxRecords ?? Infinity;
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let started = false;

  for (let i = 0; i < src.length && records.length < maxRecords; i++) {
    const ch = src[i];

    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
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
      started = true;
    } else if (ch === ",") {
      record.push(field);
      field = "";
      started = true;
    } else if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && src[i + 1] === "\n") i++;
      if (started) {
        record.push(field);
        records.push(record);
      }
      record = [];
      field = "";
      started = false;
    } else {
      field += ch;
      started = true;
    }
  }

  if (started && records.length < maxRecords) {
    record.push(field);
    records.push(record);
  }

  return records;
}
