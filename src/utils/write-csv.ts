/**
 * CSV Writer
 * Serializes a sheet table as comma-separated text in the requested encoding
 */

import Papa from "papaparse";
import iconv from "iconv-lite";
import { writeFile } from "fs/promises";
import type { SheetTable } from "../types";
import { supportsBom } from "./normalize-encoding";

export interface CsvWriteOptions {
  encoding: string;
  newline: "\n" | "\r\n";
  bom: boolean;
}

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Header line plus one line per row, each line terminated by `newline`
 */
export function serializeCsv(
  table: SheetTable,
  newline: CsvWriteOptions["newline"] = "\n",
): string {
  const csv = Papa.unparse(
    { fields: table.header, data: table.rows },
    { delimiter: ",", newline, header: true },
  );
  return csv + newline;
}

export function encodeCsv(text: string, options: CsvWriteOptions): Buffer {
  const prefix =
    options.bom && supportsBom(options.encoding) ? BYTE_ORDER_MARK : "";
  return iconv.encode(prefix + text, options.encoding);
}

/**
 * Write the table to `path`, replacing any existing file
 */
export async function writeCsv(
  table: SheetTable,
  path: string,
  options: CsvWriteOptions,
): Promise<void> {
  const text = serializeCsv(table, options.newline);
  await writeFile(path, encodeCsv(text, options));
}
