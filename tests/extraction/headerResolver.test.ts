/**
 * Unit tests for header resolution: strategy selection, de-duplication and
 * row alignment for both modes.
 */

import { describe, it, expect } from "vitest";
import {
  dedupeHeaders,
  fitRow,
  parseHeaderList,
  resolveHeaders,
  selectHeaderStrategy,
} from "@/lib/extraction/headerResolver";
import { ExtractionError } from "@/lib/extraction/errors";
import type { Cell, ParsedTable } from "@/lib/extraction/types";

const cell = (value: string, confidence = 0.9): Cell => ({ value, confidence });
const empty: Cell = { value: "", confidence: 0 };

function values(rows: Array<{ cells: Cell[] }>): string[][] {
  return rows.map((row) => row.cells.map((c) => c.value));
}

describe("parseHeaderList", () => {
  it("should split, trim and drop empty names", () => {
    expect(parseHeaderList("name, email,")).toEqual(["name", "email"]);
    expect(parseHeaderList([" a ", "", "b"])).toEqual(["a", "b"]);
  });

  it("should return an empty list for missing input", () => {
    expect(parseHeaderList(undefined)).toEqual([]);
    expect(parseHeaderList(null)).toEqual([]);
    expect(parseHeaderList("")).toEqual([]);
  });
});

describe("selectHeaderStrategy", () => {
  it("should use specify mode when the caller gave columns", () => {
    expect(selectHeaderStrategy(["name", "email"])).toEqual({ mode: "specify", headers: ["name", "email"] });
  });

  it("should use auto mode when the column list is empty or blank", () => {
    expect(selectHeaderStrategy([])).toEqual({ mode: "auto" });
    expect(selectHeaderStrategy([" ", ""])).toEqual({ mode: "auto" });
  });
});

describe("dedupeHeaders", () => {
  it("should suffix repeated names in order", () => {
    expect(dedupeHeaders(["Name", "Name", "Age", "Name"])).toEqual(["Name", "Name_2", "Age", "Name_3"]);
  });

  it("should skip suffixes that are already taken", () => {
    expect(dedupeHeaders(["a", "a", "a_2"])).toEqual(["a", "a_3", "a_2"]);
  });

  it("should leave unique names untouched", () => {
    expect(dedupeHeaders(["x", "y"])).toEqual(["x", "y"]);
  });
});

describe("fitRow", () => {
  it("should pad short rows with empty zero-confidence cells", () => {
    expect(fitRow([cell("1")], 3)).toEqual([cell("1"), empty, empty]);
  });

  it("should truncate long rows", () => {
    expect(fitRow([cell("1"), cell("2"), cell("3")], 2)).toEqual([cell("1"), cell("2")]);
  });
});

describe("resolveHeaders", () => {
  describe("specify mode", () => {
    it("should use the caller's headers over the model's", () => {
      const parsed: ParsedTable = {
        detectedHeaders: ["Name", "Email", "Phone"],
        rows: [[cell("Ann"), cell("ann@example.com"), cell("555-0100")]],
      };

      const table = resolveHeaders({ mode: "specify", headers: ["name", "email"] }, parsed);

      expect(table.headers).toEqual(["name", "email"]);
      expect(values(table.rows)).toEqual([["Ann", "ann@example.com"]]);
    });

    it("should take columns by name when the model reordered them", () => {
      const parsed: ParsedTable = {
        detectedHeaders: ["email", "name"],
        rows: [[cell("ann@example.com"), cell("Ann")]],
      };

      const table = resolveHeaders({ mode: "specify", headers: ["name", "email"] }, parsed);

      expect(values(table.rows)).toEqual([["Ann", "ann@example.com"]]);
    });

    it("should align by position when the model used other names", () => {
      const parsed: ParsedTable = {
        detectedHeaders: ["Full name", "Mail", "Phone"],
        rows: [[cell("Ann"), cell("ann@example.com"), cell("555-0100")]],
      };

      const table = resolveHeaders({ mode: "specify", headers: ["name", "email"] }, parsed);

      expect(values(table.rows)).toEqual([["Ann", "ann@example.com"]]);
    });

    it("should pad rows narrower than the requested columns", () => {
      const parsed: ParsedTable = { detectedHeaders: ["x"], rows: [[cell("1")]] };

      const table = resolveHeaders({ mode: "specify", headers: ["a", "b", "c"] }, parsed);

      expect(table.rows).toEqual([{ cells: [cell("1"), empty, empty] }]);
    });

    it("should fill a named column missing from a row with an empty cell", () => {
      const parsed: ParsedTable = { detectedHeaders: ["name", "email"], rows: [[cell("Ann")]] };

      const table = resolveHeaders({ mode: "specify", headers: ["name", "email"] }, parsed);

      expect(table.rows).toEqual([{ cells: [cell("Ann"), empty] }]);
    });

    it("should throw NO_HEADERS_RESOLVED for an empty column list", () => {
      expect(() => resolveHeaders({ mode: "specify", headers: [] }, { detectedHeaders: ["a"], rows: [] })).toThrow(
        "No column names were given"
      );
    });
  });

  describe("auto mode", () => {
    it("should de-duplicate model headers and truncate rows to fit", () => {
      const parsed: ParsedTable = {
        detectedHeaders: ["Name", "Name"],
        rows: [[cell("A"), cell("B"), cell("C")]],
      };

      const table = resolveHeaders({ mode: "auto" }, parsed);

      expect(table.headers).toEqual(["Name", "Name_2"]);
      expect(values(table.rows)).toEqual([["A", "B"]]);
    });

    it("should throw NO_HEADERS_RESOLVED when the model found no headers", () => {
      let caught: unknown;
      try {
        resolveHeaders({ mode: "auto" }, { detectedHeaders: [], rows: [[cell("orphan")]] });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ExtractionError);
      if (caught instanceof ExtractionError) {
        expect(caught.code).toBe("NO_HEADERS_RESOLVED");
      }
    });
  });

  it("should give every row exactly one cell per header", () => {
    const rows = [0, 1, 2, 3, 4, 5].map((n) => Array.from({ length: n }, (_, i) => cell(String(i))));

    for (const strategy of [{ mode: "auto" as const }, { mode: "specify" as const, headers: ["p", "q", "r"] }]) {
      const table = resolveHeaders(strategy, { detectedHeaders: ["a", "b", "c"], rows });
      expect(table.rows.every((row) => row.cells.length === table.headers.length)).toBe(true);
      expect(table.rows).toHaveLength(rows.length);
    }
  });
});
