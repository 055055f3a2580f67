/**
 * Parser for vision model output.
 *
 * Model output is untrusted: it may wrap the JSON in prose or markdown
 * fences, key rows by header name or list them positionally, send numbers
 * where strings belong, and omit or garble confidence scores. Everything is
 * validated here before it reaches header resolution.
 *
 * Accepted encodings:
 *   {"headers": [...], "rows": [{"<header>": {"value": "...", "confidence": 0.9}}]}
 *   {"headers": [...], "rows": [["...", "..."]], "confidence": [[0.9, 0.8]]}
 *   {"headers": [...], "rows": [{"cells": [{"value": "...", "confidence": 0.9}]}]}
 *   {"data": [{"<header>": "..."}], "confidence": [{"<header>": 0.9}]}
 */

import { z } from "zod";
import { EXTRACTION_ERROR_CODES, ExtractionError } from "./errors";
import { DEFAULT_CONFIDENCE, type Cell, type ParsedTable } from "./types";

type JsonObject = Record<string, unknown>;

// Only a row list is required. Any field of the wrong type is read as absent,
// so a stray table-level "confidence": 0.9 does not sink valid rows.
const optionalList = z.array(z.unknown()).optional().catch(undefined);

const tableEnvelopeSchema = z
  .object({
    headers: optionalList,
    rows: optionalList,
    data: optionalList,
    confidence: optionalList,
  })
  .refine((obj) => obj.rows !== undefined || obj.data !== undefined, {
    message: "missing rows",
  });

type TableEnvelope = z.infer<typeof tableEnvelopeSchema>;

const cellsRowSchema = z.object({
  cells: z.array(z.unknown()),
});

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Every balanced {...} span in the text, in order of its opening brace.
 * Quotes and escapes inside JSON strings are honored so braces in cell
 * values do not throw off the depth count.
 */
export function findBalancedObjectSpans(text: string): string[] {
  const spans: string[] = [];

  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === "\\") escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === "{") depth++;
      else if (ch === "}") {
        depth--;
        if (depth === 0) {
          spans.push(text.slice(start, i + 1));
          break;
        }
      }
    }
  }

  return spans;
}

export type JsonSearchResult =
  | { found: true; envelope: TableEnvelope }
  | { found: false; sawObject: boolean };

/**
 * Find the first JSON object in the text that looks like a table. Spans
 * that parse but lack a rows list are skipped, which also lets a table
 * nested inside a wrapper object be found.
 */
export function findJsonObject(text: string): JsonSearchResult {
  let sawObject = false;

  for (const span of findBalancedObjectSpans(text)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(span);
    } catch {
      continue;
    }
    if (!isPlainObject(parsed)) continue;
    sawObject = true;

    const envelope = tableEnvelopeSchema.safeParse(parsed);
    if (envelope.success) return { found: true, envelope: envelope.data };
  }

  return { found: false, sawObject };
}

/**
 * Convert any JSON value the model put in a cell into its string form.
 * Numbers arrive already parsed, so integers past 2^53 (long account or
 * phone numbers sent unquoted) have lost digits by the time they get here;
 * the prompt asks for every value as a string for that reason.
 */
export function stringifyCellValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Read a model-reported confidence.
 * Accepts numbers and numeric strings ("0.8", "85%"); values in (1, 100]
 * are treated as percentages. Returns undefined when nothing usable is
 * present so the caller can fall back.
 */
export function normalizeConfidence(raw: unknown): number | undefined {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    const trimmed = raw.trim();
    value = Number.parseFloat(trimmed.endsWith("%") ? trimmed.slice(0, -1) : trimmed);
    if (trimmed.endsWith("%")) value = value / 100;
  } else {
    return undefined;
  }

  if (!Number.isFinite(value)) return undefined;
  if (value > 1 && value <= 100) value = value / 100;
  return Math.min(1, Math.max(0, value));
}

function toCell(raw: unknown, parallelConfidence: unknown): Cell {
  if (isPlainObject(raw) && "value" in raw) {
    return {
      value: stringifyCellValue(raw.value),
      confidence:
        normalizeConfidence(raw.confidence) ??
        normalizeConfidence(parallelConfidence) ??
        DEFAULT_CONFIDENCE,
    };
  }
  return {
    value: stringifyCellValue(raw),
    confidence: normalizeConfidence(parallelConfidence) ?? DEFAULT_CONFIDENCE,
  };
}

function normalizeHeaderName(raw: unknown, index: number): string {
  const name = typeof raw === "string" || typeof raw === "number" ? String(raw).trim() : "";
  return name || `Column ${index + 1}`;
}

function lookupKey(row: JsonObject, header: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(row, header)) return header;
  const wanted = header.toLowerCase().trim();
  return Object.keys(row).find((k) => k.toLowerCase().trim() === wanted);
}

function pickParallel(confidenceRow: unknown, key: string | undefined, index: number): unknown {
  if (Array.isArray(confidenceRow)) return confidenceRow[index];
  if (isPlainObject(confidenceRow) && key !== undefined) {
    const found = lookupKey(confidenceRow, key);
    return found !== undefined ? confidenceRow[found] : undefined;
  }
  return undefined;
}

/**
 * Keys of keyed rows in first-seen order, used as headers when the model
 * sent no header list.
 */
function deriveHeadersFromKeys(rows: unknown[]): string[] {
  const seen = new Set<string>();
  const headers: string[] = [];
  for (const row of rows) {
    if (!isPlainObject(row) || cellsRowSchema.safeParse(row).success) continue;
    for (const key of Object.keys(row)) {
      const name = key.trim();
      if (!name || seen.has(name)) continue;
      seen.add(name);
      headers.push(name);
    }
  }
  return headers;
}

/**
 * Parse raw model output into headers and rows of cells.
 *
 * @throws ExtractionError MALFORMED_RESPONSE when no JSON object is found or
 * it has no rows list
 */
export function parseModelResponse(text: string): ParsedTable {
  const result = findJsonObject(text);
  const rawRows = result.found ? result.envelope.rows ?? result.envelope.data : undefined;
  if (!result.found || !rawRows) {
    const message =
      !result.found && result.sawObject
        ? 'Model response JSON has no "rows" or "data" list'
        : "Model response did not contain a JSON object";
    throw new ExtractionError(EXTRACTION_ERROR_CODES.MALFORMED_RESPONSE, message, {
      details: { preview: text.substring(0, 500) },
    });
  }

  const { envelope } = result;

  const detectedHeaders = envelope.headers
    ? envelope.headers.map(normalizeHeaderName)
    : deriveHeadersFromKeys(rawRows);
  const confidenceRows = envelope.confidence ?? [];

  const rows: Cell[][] = [];
  let skipped = 0;
  let droppedKeys = 0;

  rawRows.forEach((rawRow, rowIndex) => {
    const confidenceRow = confidenceRows[rowIndex];

    const cellsRow = cellsRowSchema.safeParse(rawRow);
    if (cellsRow.success) {
      rows.push(cellsRow.data.cells.map((raw, i) => toCell(raw, pickParallel(confidenceRow, detectedHeaders[i], i))));
      return;
    }

    if (Array.isArray(rawRow)) {
      rows.push(rawRow.map((raw, i) => toCell(raw, pickParallel(confidenceRow, detectedHeaders[i], i))));
      return;
    }

    if (isPlainObject(rawRow)) {
      const used = new Set<string>();
      rows.push(
        detectedHeaders.map((header, i) => {
          const key = lookupKey(rawRow, header);
          if (key !== undefined) used.add(key);
          return toCell(key !== undefined ? rawRow[key] : undefined, pickParallel(confidenceRow, header, i));
        })
      );
      droppedKeys += Object.keys(rawRow).filter((k) => !used.has(k)).length;
      return;
    }

    skipped++;
  });

  if (skipped > 0 || droppedKeys > 0) {
    console.warn("[Response Parser] Ignored parts of model output:", {
      skippedRows: skipped,
      unknownKeys: droppedKeys,
    });
  }

  return { detectedHeaders, rows };
}
