/**
 * CSV store types.
 */

/**
 * What a save does when the store's header line differs from the table's:
 * - reject: fail with HEADER_MISMATCH and leave the store untouched
 * - remap: reorder incoming cells into the store's columns by name
 */
export type HeaderMismatchPolicy = "reject" | "remap";

/**
 * Rows the caller chose to keep after reviewing an extraction preview.
 * Only cell values are persisted; confidence stays in the preview.
 */
export type SaveTableInput = {
  headers: string[];
  rows: Array<{ cells: Array<{ value: string }> }>;
};

export type SaveOptions = {
  policy?: HeaderMismatchPolicy;
};

export type SaveResult = {
  storePath: string;
  rowsWritten: number;
  created: boolean; // header line written by this save
  remapped: boolean; // rows were reordered into existing store columns
  headers: string[]; // the store's columns
};

export type StoreContents = {
  headers: string[];
  rows: string[][];
};
