import { NextResponse } from "next/server";
import { getHeaderMismatchPolicy, getStorePath } from "@/lib/config/store";
import { saveRequestSchema } from "@/lib/http/schemas";
import { errorResponse, readJsonBody } from "@/lib/http/responses";
import { saveTable } from "@/lib/store/csvStore";

export const runtime = "nodejs";

/**
 * POST /api/save
 * Appends the reviewed rows to the CSV store. The store path comes from
 * CSV_STORE_PATH, never from the request.
 */
export async function POST(request: Request) {
  try {
    const { table } = await readJsonBody(request, saveRequestSchema);
    const result = await saveTable(table, getStorePath(), { policy: getHeaderMismatchPolicy() });

    return NextResponse.json({
      message: `Saved ${result.rowsWritten} rows to CSV`,
      rowsWritten: result.rowsWritten,
      created: result.created,
      remapped: result.remapped,
      headers: result.headers,
    });
  } catch (error) {
    return errorResponse(error, "Save");
  }
}
