/**
 * Error codes surfaced by extraction and the CSV store.
 *
 * Every failure in the pipeline is thrown as an ExtractionError carrying one
 * of these codes; route handlers turn the code into an HTTP status.
 */

export const EXTRACTION_ERROR_CODES = {
  // Model client
  UNREACHABLE_ENDPOINT: "UNREACHABLE_ENDPOINT",
  MODEL_UNAVAILABLE: "MODEL_UNAVAILABLE",
  MODEL_REQUEST_REJECTED: "MODEL_REQUEST_REJECTED",
  TIMEOUT: "TIMEOUT",
  // Response parser
  MALFORMED_RESPONSE: "MALFORMED_RESPONSE",
  // Header resolver
  NO_HEADERS_RESOLVED: "NO_HEADERS_RESOLVED",
  // CSV store
  STORE_UNWRITABLE: "STORE_UNWRITABLE",
  HEADER_MISMATCH: "HEADER_MISMATCH",
  STORE_NOT_FOUND: "STORE_NOT_FOUND",
  // Caller input
  INVALID_REQUEST: "INVALID_REQUEST",
} as const;

export type ExtractionErrorCode =
  (typeof EXTRACTION_ERROR_CODES)[keyof typeof EXTRACTION_ERROR_CODES];

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExtractionErrorCode,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ExtractionError";
    this.code = code;
    this.details = options?.details;
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

/**
 * Only transport failures are worth retrying with backoff. A malformed
 * response should be re-submitted with different instructions or a different
 * model instead.
 */
export function isRetryableError(code: ExtractionErrorCode): boolean {
  return (
    code === EXTRACTION_ERROR_CODES.TIMEOUT ||
    code === EXTRACTION_ERROR_CODES.UNREACHABLE_ENDPOINT
  );
}

const HTTP_STATUS_BY_CODE: Record<ExtractionErrorCode, number> = {
  UNREACHABLE_ENDPOINT: 502,
  MODEL_UNAVAILABLE: 404,
  MODEL_REQUEST_REJECTED: 502,
  TIMEOUT: 504,
  MALFORMED_RESPONSE: 422,
  NO_HEADERS_RESOLVED: 422,
  STORE_UNWRITABLE: 500,
  HEADER_MISMATCH: 409,
  STORE_NOT_FOUND: 404,
  INVALID_REQUEST: 400,
};

export function httpStatusForError(code: ExtractionErrorCode): number {
  return HTTP_STATUS_BY_CODE[code];
}
