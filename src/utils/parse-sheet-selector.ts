import type { SheetSelector } from "../types";

/**
 * Parse the sheet field typed by the user
 * Integers are zero-based indexes, anything else is a sheet name
 *
 * @example
 * parseSheetSelector("1") // { kind: "index", index: 1 }
 * parseSheetSelector("Sheet2") // { kind: "name", name: "Sheet2" }
 * parseSheetSelector("") // { kind: "index", index: 0 }
 */
export function parseSheetSelector(raw: string): SheetSelector {
  const value = raw.trim();

  if (value === "") {
    return { kind: "index", index: 0 };
  }

  if (/^[+-]?\d+$/.test(value)) {
    return { kind: "index", index: Number.parseInt(value, 10) };
  }

  return { kind: "name", name: value };
}
