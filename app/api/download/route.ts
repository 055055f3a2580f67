import { NextResponse } from "next/server";
import { getStorePath } from "@/lib/config/store";
import { errorResponse } from "@/lib/http/responses";
import { exportStore } from "@/lib/store/csvStore";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * GET /api/download
 * The CSV store as an attachment, or 404 before the first save.
 */
export async function GET() {
  try {
    const bytes = await exportStore(getStorePath());
    console.log("[Download] Sending CSV store:", { bytes: bytes.length });

    return new NextResponse(new Uint8Array(bytes), {
      status: 200,
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": 'attachment; filename="results.csv"',
        "Cache-Control": "no-store",
      },
    });
  } catch (error) {
    return errorResponse(error, "Download");
  }
}
