/**
 * Extraction Access Layer - Main Entry Point
 *
 * WIRING MAP:
 *   - app/api/extract/route.ts -> decodeImageInput(), parseHeaderList(), extractTable()
 *   - app/api/save/route.ts -> lib/store/csvStore.ts saveTable()
 *   - app/api/download/route.ts -> lib/store/csvStore.ts exportStore()
 *   - app/api/ollama-status, app/api/ollama-models -> lib/ollama/probe.ts probe()
 */

export { extractTable } from "./extractTable";
export { callVisionModel, modelMatches } from "./modelClient";
export { parseModelResponse, findJsonObject } from "./responseParser";
export { resolveHeaders, selectHeaderStrategy, parseHeaderList, dedupeHeaders } from "./headerResolver";
export { annotateTable, confidenceLabel } from "./confidence";
export { decodeImageInput } from "./image";
export {
  EXTRACTION_ERROR_CODES,
  ExtractionError,
  isExtractionError,
  isRetryableError,
} from "./errors";

export type {
  AnnotatedCell,
  AnnotatedTable,
  Cell,
  ExtractionRequest,
  HeaderStrategy,
  ParsedTable,
  Row,
  Table,
} from "./types";
export type { ExtractionErrorCode } from "./errors";
export { DEFAULT_CONFIDENCE } from "./types";
