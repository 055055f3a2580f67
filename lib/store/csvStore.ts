/**
 * CSV store: the persistent dataset that accepted extraction rows are merged
 * into.
 *
 * - The header line is written once, by the save that creates the store,
 *   and never rewritten.
 * - A save lands all of its rows or none: the new content goes to a temp
 *   file beside the store and is renamed over it.
 * - Saves to the same path are serialized by withStoreLock.
 * - The store is never deleted here.
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { EXTRACTION_ERROR_CODES, ExtractionError } from "@/lib/extraction/errors";
import { describeError, getErrorMessage } from "@/lib/utils/error";
import { formatCsvLine, parseCsv } from "./csv";
import { withStoreLock } from "./storeLock";
import type { HeaderMismatchPolicy, SaveOptions, SaveResult, SaveTableInput, StoreContents } from "./types";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function unwritable(storePath: string, action: string, error: unknown): ExtractionError {
  return new ExtractionError(
    EXTRACTION_ERROR_CODES.STORE_UNWRITABLE,
    `Failed to ${action} CSV store ${storePath}: ${getErrorMessage(error)}`,
    { details: { storePath }, cause: error }
  );
}

/**
 * Current store content, or null when the file does not exist.
 */
async function readExisting(storePath: string): Promise<string | null> {
  try {
    return await readFile(storePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw unwritable(storePath, "read", error);
  }
}

function validateTable(table: SaveTableInput): void {
  if (table.headers.length === 0) {
    throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, "Cannot save a table without headers");
  }
  const seen = new Set<string>();
  for (const header of table.headers) {
    if (seen.has(header)) {
      throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, `Duplicate column "${header}" in table`, {
        details: { headers: table.headers },
      });
    }
    seen.add(header);
  }
}

function headersEqual(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((h, i) => h === b[i]);
}

/**
 * For each store column, the index of the table column with the same name
 * (case-insensitive, trimmed), or -1 when the table has no such column.
 */
export function buildColumnMap(storeHeaders: string[], tableHeaders: string[]): number[] {
  const tableLower = tableHeaders.map((h) => h.toLowerCase().trim());
  return storeHeaders.map((h) => tableLower.indexOf(h.toLowerCase().trim()));
}

function rowValues(cells: Array<{ value: string }>, width: number): string[] {
  const values = cells.slice(0, width).map((c) => c.value);
  while (values.length < width) values.push("");
  return values;
}

type MergePlan = {
  headers: string[];
  created: boolean;
  remapped: boolean;
  toLine: (cells: Array<{ value: string }>) => string;
};

function planMerge(
  storePath: string,
  existing: string | null,
  table: SaveTableInput,
  policy: HeaderMismatchPolicy
): MergePlan {
  if (existing === null || existing.trim() === "") {
    return {
      headers: table.headers,
      created: true,
      remapped: false,
      toLine: (cells) => formatCsvLine(rowValues(cells, table.headers.length)),
    };
  }

  const storeHeaders = parseCsv(existing, { maxRecords: 1 })[0] ?? [];
  if (headersEqual(storeHeaders, table.headers)) {
    return {
      headers: storeHeaders,
      created: false,
      remapped: false,
      toLine: (cells) => formatCsvLine(rowValues(cells, storeHeaders.length)),
    };
  }

  if (policy === "reject") {
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.HEADER_MISMATCH,
      `Table columns [${table.headers.join(", ")}] do not match the store's columns [${storeHeaders.join(", ")}]`,
      { details: { storePath, storeHeaders, tableHeaders: table.headers } }
    );
  }

  const columnMap = buildColumnMap(storeHeaders, table.headers);
  const unmatched = table.headers.filter((_, i) => !columnMap.includes(i));
  console.warn("[CSV Store] Remapping rows into existing columns:", {
    storePath,
    storeHeaders,
    tableHeaders: table.headers,
    droppedColumns: unmatched,
  });

  return {
    headers: storeHeaders,
    created: false,
    remapped: true,
    toLine: (cells) => formatCsvLine(columnMap.map((i) => (i >= 0 ? cells[i]?.value ?? "" : ""))),
  };
}

async function writeAtomically(storePath: string, content: string): Promise<void> {
  const tempPath = `${storePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await mkdir(path.dirname(path.resolve(storePath)), { recursive: true });
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, storePath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.error("[CSV Store] Failed to remove temp file:", { tempPath, error: describeError(cleanupError) });
    });
    throw unwritable(storePath, "write", error);
  }
}

/**
 * Append the table's rows to the CSV store at storePath, creating it with
 * the table's header line when it does not exist (or is empty).
 *
 * @throws ExtractionError HEADER_MISMATCH (policy "reject"), STORE_UNWRITABLE,
 * or INVALID_REQUEST for a table without headers or with duplicate headers
 */
export async function saveTable(
  table: SaveTableInput,
  storePath: string,
  options: SaveOptions = {}
): Promise<SaveResult> {
  validateTable(table);
  const policy = options.policy ?? "reject";

  return withStoreLock(storePath, async () => {
    const existing = await readExisting(storePath);
    const plan = planMerge(storePath, existing, table, policy);

    if (table.rows.length === 0) {
      return { storePath, rowsWritten: 0, created: false, remapped: plan.remapped, headers: plan.headers };
    }

    const lines = table.rows.map((row) => plan.toLine(row.cells));
    const prefix =
      plan.created || existing === null
        ? `${formatCsvLine(plan.headers)}\n`
        : existing.endsWith("\n")
          ? existing
          : `${existing}\n`;

    await writeAtomically(storePath, `${prefix}${lines.join("\n")}\n`);

    console.log("[CSV Store] Saved rows:", {
      storePath,
      rowsWritten: lines.length,
      created: plan.created,
      remapped: plan.remapped,
    });

    return {
      storePath,
      rowsWritten: lines.length,
      created: plan.created,
      remapped: plan.remapped,
      headers: plan.headers,
    };
  });
}

/**
 * Raw bytes of the CSV store, for download.
 *
 * @throws ExtractionError STORE_NOT_FOUND when nothing has been saved yet
 */
export async function exportStore(storePath: string): Promise<Buffer> {
  try {
    return await readFile(storePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ExtractionError(EXTRACTION_ERROR_CODES.STORE_NOT_FOUND, "No CSV file found", {
        details: { storePath },
      });
    }
    throw unwritable(storePath, "read", error);
  }
}

/**
 * Parse the store back into its header line and data rows.
 */
export async function readStore(storePath: string): Promise<StoreContents> {
  const records = parseCsv((await exportStore(storePath)).toString("utf8"));
  const [headers = [], ...rows] = records;
  return { headers, rows };
}
