/**
 * Pipeline tests for extractTable with the model call mocked.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@/lib/extraction/modelClient", () => ({
  callVisionModel: vi.fn(),
}));

import { extractTable } from "@/lib/extraction/extractTable";
import { callVisionModel } from "@/lib/extraction/modelClient";
import type { ExtractionRequest } from "@/lib/extraction/types";

const mockedCall = vi.mocked(callVisionModel);

const request: ExtractionRequest = {
  image: Buffer.from([0xff, 0xd8, 0xff]),
  mimeType: "image/jpeg",
  headers: [],
  instructions: "",
  model: "qwen2.5vl:7b",
  threshold: 0.7,
};

describe("extractTable", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should use the model's headers in auto mode and flag unscored cells", async () => {
    mockedCall.mockResolvedValue('{"headers":["Name","Age"],"rows":[{"Name":"Alice","Age":"30"}]}');

    const table = await extractTable(request);

    expect(table.headers).toEqual(["Name", "Age"]);
    expect(table.rows).toEqual([
      {
        cells: [
          { value: "Alice", confidence: 0, lowConfidence: true },
          { value: "30", confidence: 0, lowConfidence: true },
        ],
      },
    ]);
    expect(table.lowConfidenceCount).toBe(2);
    expect(mockedCall).toHaveBeenCalledWith(expect.objectContaining({ strategy: { mode: "auto" } }), {});
  });

  it("should keep the caller's columns when the model returns more", async () => {
    mockedCall.mockResolvedValue(
      JSON.stringify({
        headers: ["Name", "Email", "Phone"],
        rows: [
          [
            { value: "Ann", confidence: 0.95 },
            { value: "ann@example.com", confidence: 0.5 },
            { value: "555-0100", confidence: 0.9 },
          ],
        ],
      })
    );

    const table = await extractTable({ ...request, headers: ["name", "email"] });

    expect(table.headers).toEqual(["name", "email"]);
    expect(table.rows).toEqual([
      {
        cells: [
          { value: "Ann", confidence: 0.95, lowConfidence: false },
          { value: "ann@example.com", confidence: 0.5, lowConfidence: true },
        ],
      },
    ]);
    expect(mockedCall).toHaveBeenCalledWith(
      expect.objectContaining({ strategy: { mode: "specify", headers: ["name", "email"] } }),
      {}
    );
  });

  it("should pass host and timeout overrides to the model client", async () => {
    mockedCall.mockResolvedValue('{"headers":["A"],"rows":[]}');

    await extractTable(request, { host: "http://gpu-box:11434", timeoutMs: 1000 });

    expect(mockedCall).toHaveBeenCalledWith(expect.anything(), { host: "http://gpu-box:11434", timeoutMs: 1000 });
  });

  it("should surface MALFORMED_RESPONSE from the parser", async () => {
    mockedCall.mockResolvedValue("Sorry, I cannot read this image.");

    await expect(extractTable(request)).rejects.toMatchObject({ code: "MALFORMED_RESPONSE" });
  });

  it("should surface NO_HEADERS_RESOLVED when auto mode finds no headers", async () => {
    mockedCall.mockResolvedValue('{"rows":[["a","b"]]}');

    await expect(extractTable(request)).rejects.toMatchObject({ code: "NO_HEADERS_RESOLVED" });
  });

  it("should reject an invalid threshold without calling the model", async () => {
    await expect(extractTable({ ...request, threshold: 2 })).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    expect(mockedCall).not.toHaveBeenCalled();
  });
});
