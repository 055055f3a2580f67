/**
 * CSV store configuration.
 */

import type { HeaderMismatchPolicy } from "@/lib/store/types";

const DEFAULT_STORE_PATH = "data/results.csv";

/**
 * Path of the CSV dataset the HTTP routes save into and download from.
 * The core store functions always take the path explicitly.
 */
export function getStorePath(): string {
  return process.env.CSV_STORE_PATH || DEFAULT_STORE_PATH;
}

/**
 * What a save does when the store's header line differs from the table's.
 * Defaults to "reject".
 */
export function getHeaderMismatchPolicy(): HeaderMismatchPolicy {
  const raw = (process.env.STORE_HEADER_POLICY || "").trim().toLowerCase();
  if (raw === "remap") return "remap";
  if (raw && raw !== "reject") {
    console.warn(`[Config] Unknown STORE_HEADER_POLICY=${JSON.stringify(raw)}, using "reject"`);
  }
  return "reject";
}
