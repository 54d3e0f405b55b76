import { describe, it, expect } from "vitest";
import { parseSheetSelector } from "./parse-sheet-selector";

describe("parseSheetSelector", () => {
  it("parses integers as zero-based indexes", () => {
    expect(parseSheetSelector("0")).toEqual({ kind: "index", index: 0 });
    expect(parseSheetSelector("2")).toEqual({ kind: "index", index: 2 });
    expect(parseSheetSelector(" 1 ")).toEqual({ kind: "index", index: 1 });
  });

  it("treats other text as a sheet name", () => {
    expect(parseSheetSelector("Sheet2")).toEqual({
      kind: "name",
      name: "Sheet2",
    });
    expect(parseSheetSelector("1.5")).toEqual({ kind: "name", name: "1.5" });
  });

  it("trims names", () => {
    expect(parseSheetSelector("  Data ")).toEqual({
      kind: "name",
      name: "Data",
    });
  });

  it("defaults to the first sheet when empty", () => {
    expect(parseSheetSelector("")).toEqual({ kind: "index", index: 0 });
    expect(parseSheetSelector("   ")).toEqual({ kind: "index", index: 0 });
  });

  it("keeps negative numbers as indexes", () => {
    expect(parseSheetSelector("-1")).toEqual({ kind: "index", index: -1 });
  });
});
