import { NextResponse } from "next/server";
import { probe } from "@/lib/ollama/probe";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * GET /api/ollama-models?host=<url>
 * Models installed on the Ollama endpoint, for the model picker.
 */
export async function GET(request: Request) {
  const params = new URL(request.url).searchParams;
  const result = await probe({ host: params.get("host"), fresh: params.get("refresh") === "1" });

  return NextResponse.json({
    status: result.status,
    host: result.host,
    current_model: result.currentModel,
    models: result.models,
    count: result.models.length,
    message: result.message,
  });
}
