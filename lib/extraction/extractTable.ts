/**
 * Extraction pipeline: photo in, annotated preview table out.
 *
 *   callVisionModel -> parseModelResponse -> resolveHeaders -> annotateTable
 *
 * Nothing here touches the CSV store; rows are only persisted by an
 * explicit save.
 */

import { annotateTable, assertValidThreshold } from "./confidence";
import { resolveHeaders, selectHeaderStrategy } from "./headerResolver";
import { callVisionModel, type VisionModelOptions } from "./modelClient";
import { parseModelResponse } from "./responseParser";
import type { AnnotatedTable, ExtractionRequest } from "./types";

export async function extractTable(
  request: ExtractionRequest,
  options: VisionModelOptions = {}
): Promise<AnnotatedTable> {
  assertValidThreshold(request.threshold);

  const strategy = selectHeaderStrategy(request.headers);
  console.log("[Extract] Starting extraction:", {
    mode: strategy.mode,
    headers: strategy.mode === "specify" ? strategy.headers : [],
    model: request.model,
    threshold: request.threshold,
  });

  const raw = await callVisionModel(
    {
      image: request.image,
      mimeType: request.mimeType,
      strategy,
      instructions: request.instructions,
      model: request.model,
    },
    options
  );

  const parsed = parseModelResponse(raw);
  const table = resolveHeaders(strategy, parsed);
  const annotated = annotateTable(table, request.threshold);

  console.log("[Extract] Extraction complete:", {
    headers: annotated.headers,
    rowCount: annotated.rows.length,
    lowConfidenceCount: annotated.lowConfidenceCount,
  });

  return annotated;
}
