/**
 * Types for table extraction from handwritten spreadsheet photos.
 */

/**
 * Confidence given to a cell when the model omits a score or sends
 * something that is not a number. Zero keeps such cells below any
 * threshold, so they always come up for review.
 */
export const DEFAULT_CONFIDENCE = 0;

export type Cell = {
  value: string;
  confidence: number; // 0.0 - 1.0
};

export type AnnotatedCell = Cell & {
  lowConfidence: boolean;
};

export type Row<C extends Cell = Cell> = {
  cells: C[];
};

/**
 * A resolved table: every row has exactly headers.length cells and header
 * names are unique.
 */
export type Table<C extends Cell = Cell> = {
  headers: string[];
  rows: Row<C>[];
};

export type AnnotatedTable = Table<AnnotatedCell> & {
  threshold: number;
  lowConfidenceCount: number;
  labelCounts: Record<ConfidenceLabel, number>;
};

/**
 * What the response parser recovered from model output, before header
 * resolution. Rows are positional against detectedHeaders but may be
 * shorter or longer than it.
 */
export type ParsedTable = {
  detectedHeaders: string[];
  rows: Cell[][];
};

/**
 * How the effective column set is decided for one request.
 * - specify: the caller named the columns
 * - auto: use whatever header row the model read from the image
 */
export type HeaderStrategy =
  | { mode: "specify"; headers: string[] }
  | { mode: "auto" };

export type ExtractionRequest = {
  image: Buffer;
  mimeType: string;
  headers: string[]; // empty = auto-detect
  instructions: string;
  model: string;
  threshold: number;
};

export type ConfidenceLabel = "high" | "medium" | "low";
