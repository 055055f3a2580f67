/**
 * Header resolution: decides the authoritative column list for one
 * extraction and aligns parsed rows to it.
 */

import { EXTRACTION_ERROR_CODES, ExtractionError } from "./errors";
import { DEFAULT_CONFIDENCE, type Cell, type HeaderStrategy, type ParsedTable, type Table } from "./types";

/**
 * Split a comma-separated column list ("name, email,") into trimmed,
 * non-empty names.
 */
export function parseHeaderList(input: string | string[] | null | undefined): string[] {
  if (!input) return [];
  const parts = Array.isArray(input) ? input : input.split(",");
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/**
 * Pick the strategy once per request: caller-specified columns win; an empty
 * list means the model's header row is used.
 */
export function selectHeaderStrategy(userHeaders: string[]): HeaderStrategy {
  const headers = parseHeaderList(userHeaders);
  return headers.length > 0 ? { mode: "specify", headers } : { mode: "auto" };
}

/**
 * Make header names unique. The first occurrence keeps its name; later
 * ones get _2, _3, ... skipping any suffixed name already in the list.
 */
export function dedupeHeaders(headers: string[]): string[] {
  const taken = new Set(headers);
  const used = new Set<string>();
  const result: string[] = [];

  for (const header of headers) {
    if (!used.has(header)) {
      used.add(header);
      result.push(header);
      continue;
    }
    let n = 2;
    while (used.has(`${header}_${n}`) || taken.has(`${header}_${n}`)) n++;
    const renamed = `${header}_${n}`;
    used.add(renamed);
    result.push(renamed);
  }

  return result;
}

function emptyCell(): Cell {
  return { value: "", confidence: DEFAULT_CONFIDENCE };
}

/**
 * Pad with empty cells or truncate so the row has exactly `width` cells.
 */
export function fitRow(cells: Cell[], width: number): Cell[] {
  if (cells.length >= width) return cells.slice(0, width);
  return [...cells, ...Array.from({ length: width - cells.length }, emptyCell)];
}

const normalizeName = (name: string) => name.toLowerCase().trim();

/**
 * Column index in the model's output for each user header, when every user
 * header appears among the model's headers. Null means fall back to
 * positional alignment.
 */
function matchByName(userHeaders: string[], detectedHeaders: string[]): number[] | null {
  const detected = detectedHeaders.map(normalizeName);
  const indexes = userHeaders.map((h) => detected.indexOf(normalizeName(h)));
  return indexes.every((i) => i >= 0) ? indexes : null;
}

/**
 * Resolve the effective headers and align every row to them.
 *
 * specify: user headers take precedence. Rows are aligned by position,
 * dropping extra model columns and padding missing ones. If the model echoed
 * every user header by name, columns are taken by name instead so a
 * reordered model response still lands in the right columns.
 *
 * auto: model headers are used after de-duplication; rows are padded or
 * truncated to fit.
 *
 * @throws ExtractionError NO_HEADERS_RESOLVED when no headers come out
 */
export function resolveHeaders(strategy: HeaderStrategy, parsed: ParsedTable): Table {
  const headers = dedupeHeaders(strategy.mode === "specify" ? strategy.headers : parsed.detectedHeaders);

  if (headers.length === 0) {
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.NO_HEADERS_RESOLVED,
      strategy.mode === "specify"
        ? "No column names were given"
        : "The model did not detect any column headers; specify the columns and try again",
      { details: { mode: strategy.mode, rowCount: parsed.rows.length } }
    );
  }

  const byName = strategy.mode === "specify" ? matchByName(headers, parsed.detectedHeaders) : null;

  const rows = parsed.rows.map((cells) => ({
    cells: byName ? byName.map((i) => cells[i] ?? emptyCell()) : fitRow(cells, headers.length),
  }));

  console.log("[Header Resolver] Resolved headers:", {
    mode: strategy.mode,
    alignment: strategy.mode === "auto" ? "model" : byName ? "by-name" : "positional",
    headers,
    detectedHeaders: parsed.detectedHeaders,
    rowCount: rows.length,
  });

  return { headers, rows };
}
