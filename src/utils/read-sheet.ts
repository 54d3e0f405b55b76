/**
 * Sheet Reader
 * Loads one worksheet of an .xlsx workbook as a header row plus text rows
 */

import * as XLSX from "xlsx";
import { readFile } from "fs/promises";
import type { SheetSelector, SheetTable } from "../types";
import { SheetNotFoundError, WorkbookParseError } from "./errors";

// Every .xlsx file is a zip archive
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

function isZipArchive(buffer: Buffer): boolean {
  return ZIP_SIGNATURE.every((byte, i) => buffer[i] === byte);
}

/**
 * Read and parse a workbook
 * File system errors propagate untouched, unreadable content becomes WorkbookParseError
 */
export async function loadWorkbook(path: string): Promise<XLSX.WorkBook> {
  const buffer = await readFile(path);

  // SheetJS falls back to plain-text parsing for anything it does not recognize
  if (!isZipArchive(buffer)) {
    throw new WorkbookParseError(path, "File is not a valid .xlsx workbook");
  }

  try {
    return XLSX.read(buffer, { type: "buffer", cellDates: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WorkbookParseError(path, `Unable to parse workbook: ${reason}`, {
      cause: error,
    });
  }
}

export function resolveSheetName(
  sheetNames: string[],
  selector: SheetSelector,
): string {
  if (selector.kind === "index") {
    // Negative indexes count from the last sheet
    const position =
      selector.index < 0 ? sheetNames.length + selector.index : selector.index;
    const name = position < 0 ? undefined : sheetNames[position];
    if (name === undefined) {
      throw new SheetNotFoundError(selector, sheetNames);
    }
    return name;
  }

  if (!sheetNames.includes(selector.name)) {
    throw new SheetNotFoundError(selector, sheetNames);
  }
  return selector.name;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function isMidnight(value: Date): boolean {
  return (
    value.getHours() === 0 &&
    value.getMinutes() === 0 &&
    value.getSeconds() === 0 &&
    value.getMilliseconds() === 0
  );
}

/**
 * Render a cell the way it appears in the CSV
 * With `dateOnly`, dates drop their time of day
 */
export function formatCell(value: unknown, dateOnly = false): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    const date = `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
    if (dateOnly) {
      return date;
    }
    const time = `${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
    return `${date} ${time}`;
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  return String(value);
}

/**
 * Column names from the first row
 * Blank names become "Unnamed: <i>", repeated names get ".1", ".2", ...
 */
export function buildHeader(cells: unknown[], width: number): string[] {
  const seen = new Map<string, number>();
  const header: string[] = [];

  for (let i = 0; i < width; i++) {
    let name = formatCell(cells[i]);
    if (name === "") {
      name = `Unnamed: ${i}`;
    }

    const count = seen.get(name);
    if (count === undefined) {
      seen.set(name, 0);
    } else {
      let next = count + 1;
      while (seen.has(`${name}.${next}`)) {
        next++;
      }
      seen.set(name, next);
      name = `${name}.${next}`;
      seen.set(name, 0);
    }

    header.push(name);
  }

  return header;
}

/**
 * A column holding nothing but dates at midnight is written without times
 */
export function isDateOnlyColumn(rows: unknown[][], column: number): boolean {
  let dates = 0;
  for (const row of rows) {
    const value = row[column];
    if (value === null || value === undefined) {
      continue;
    }
    if (!(value instanceof Date) || !isMidnight(value)) {
      return false;
    }
    dates++;
  }
  return dates > 0;
}

/**
 * Turn raw sheet rows into a rectangular text table
 */
export function toSheetTable(sheetName: string, raw: unknown[][]): SheetTable {
  if (raw.length === 0) {
    return { sheetName, header: [], rows: [] };
  }

  const [first, ...rest] = raw;
  const width = raw.reduce((max, row) => Math.max(max, row.length), 0);
  const header = buildHeader(first, width);
  const dateOnly = header.map((_, i) => isDateOnlyColumn(rest, i));
  const rows = rest.map((row) =>
    header.map((_, i) => formatCell(row[i], dateOnly[i])),
  );

  return { sheetName, header, rows };
}

/**
 * Load the selected sheet of a workbook
 *
 * @throws WorkbookParseError when the file is not a readable workbook
 * @throws SheetNotFoundError when the selector matches no sheet
 */
export async function readSheet(
  path: string,
  selector: SheetSelector,
): Promise<SheetTable> {
  const workbook = await loadWorkbook(path);
  const sheetName = resolveSheetName(workbook.SheetNames, selector);
  const worksheet = workbook.Sheets[sheetName];

  if (!worksheet) {
    throw new SheetNotFoundError(selector, workbook.SheetNames);
  }

  const raw = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  return toSheetTable(sheetName, raw);
}
