/**
 * Confidence annotation for review.
 *
 * Flags are derived from each cell's confidence and the request threshold.
 * Values are never changed and rows are never dropped.
 */

import { EXTRACTION_ERROR_CODES, ExtractionError } from "./errors";
import type { AnnotatedTable, Cell, ConfidenceLabel, Table } from "./types";

export function assertValidThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.INVALID_REQUEST,
      `Confidence threshold must be between 0 and 1 (got ${threshold})`
    );
  }
}

/**
 * Mark every cell whose confidence is below the threshold.
 * Accepts an already annotated table; existing flags are recomputed, so
 * annotating twice with the same threshold gives the same result.
 */
export function annotateTable(table: Table<Cell>, threshold: number): AnnotatedTable {
  assertValidThreshold(threshold);

  let lowConfidenceCount = 0;
  const labelCounts: Record<ConfidenceLabel, number> = { high: 0, medium: 0, low: 0 };
  const rows = table.rows.map((row) => ({
    cells: row.cells.map((cell) => {
      const lowConfidence = cell.confidence < threshold;
      if (lowConfidence) lowConfidenceCount++;
      labelCounts[confidenceLabel(cell.confidence)]++;
      return { value: cell.value, confidence: cell.confidence, lowConfidence };
    }),
  }));

  return { headers: [...table.headers], rows, threshold, lowConfidenceCount, labelCounts };
}

// High (>= 0.9): clear handwriting
// Medium (>= 0.6): readable but worth a glance
// Low (< 0.6): needs manual review
export function confidenceLabel(confidence: number | null | undefined): ConfidenceLabel {
  if (confidence == null || Number.isNaN(confidence)) return "low";
  if (confidence >= 0.9) return "high";
  if (confidence >= 0.6) return "medium";
  return "low";
}
