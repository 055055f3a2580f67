/**
 * Shared response helpers for the API routes.
 */

import { NextResponse } from "next/server";
import type { z } from "zod";
import {
  EXTRACTION_ERROR_CODES,
  ExtractionError,
  httpStatusForError,
  isExtractionError,
} from "@/lib/extraction/errors";
import { describeError } from "@/lib/utils/error";

/**
 * Map an error thrown by the pipeline to a JSON response. ExtractionErrors
 * keep their code; anything else is a 500.
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
  if (isExtractionError(error)) {
    const status = httpStatusForError(error.code);
    const log = status >= 500 ? console.error : console.warn;
    log(`[${tag}] ${error.code}:`, { message: error.message, details: error.details });
    return NextResponse.json({ error: error.message, code: error.code }, { status });
  }

  console.error(`[${tag}] Unexpected error:`, describeError(error));
  return NextResponse.json({ error: "Internal server error", code: "INTERNAL_ERROR" }, { status: 500 });
}

/**
 * Read and validate a JSON request body.
 *
 * @throws ExtractionError INVALID_REQUEST for unparseable JSON or a body
 * that fails the schema
 */
export async function readJsonBody<T extends z.ZodTypeAny>(request: Request, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new ExtractionError(EXTRACTION_ERROR_CODES.INVALID_REQUEST, "Request body must be JSON");
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ExtractionError(
      EXTRACTION_ERROR_CODES.INVALID_REQUEST,
      `${where}${issue?.message ?? "Invalid request body"}`,
      { details: { issues: parsed.error.issues.length } }
    );
  }
  return parsed.data;
}
