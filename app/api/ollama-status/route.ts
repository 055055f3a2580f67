import { NextResponse } from "next/server";
import { probe } from "@/lib/ollama/probe";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * GET /api/ollama-status?host=<url>
 * Reachability of the Ollama endpoint. Always 200: "offline" is a status.
 */
export async function GET(request: Request) {
  const host = new URL(request.url).searchParams.get("host");
  const result = await probe({ host });

  return NextResponse.json({
    status: result.status,
    host: result.host,
    current_model: result.currentModel,
    message: result.message,
    checked_at: result.checkedAt,
  });
}
