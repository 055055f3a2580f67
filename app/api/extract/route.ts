import { NextResponse } from "next/server";
import { getConfidenceThreshold, getDefaultModelName } from "@/lib/config/ollama";
import { decodeImageInput, extractTable, parseHeaderList } from "@/lib/extraction";
import { extractRequestSchema } from "@/lib/http/schemas";
import { errorResponse, readJsonBody } from "@/lib/http/responses";

export const runtime = "nodejs";
// Vision models can take tens of seconds on a large photo
export const maxDuration = 300;

export async function GET() {
  return NextResponse.json(
    { ok: false, message: "Use POST with a JSON body: { image, columns?, instructions?, model?, threshold? }" },
    { status: 405 }
  );
}

/**
 * POST /api/extract
 * Reads a photographed spreadsheet and returns an annotated preview table.
 * Does not save anything.
 */
export async function POST(request: Request) {
  try {
    const body = await readJsonBody(request, extractRequestSchema);
    const { buffer, mimeType } = decodeImageInput(body.image);

    const table = await extractTable({
      image: buffer,
      mimeType,
      headers: parseHeaderList(body.columns),
      instructions: body.instructions ?? "",
      model: body.model ?? getDefaultModelName(),
      threshold: body.threshold ?? getConfidenceThreshold(),
    });

    return NextResponse.json(table);
  } catch (error) {
    return errorResponse(error, "Extract");
  }
}
