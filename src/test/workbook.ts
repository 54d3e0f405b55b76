/**
 * Test helpers: temporary directories and generated workbooks
 */

import * as XLSX from "xlsx";
import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "xlsx2csv-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write an .xlsx file with one sheet per entry, in insertion order
 */
export async function writeWorkbook(
  path: string,
  sheets: Record<string, unknown[][]>,
): Promise<void> {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }

  const buffer: Buffer = XLSX.write(workbook, {
    type: "buffer",
    bookType: "xlsx",
  });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, buffer);
}

/**
 * Header plus `count` rows of three columns
 */
export function salesRows(count: number): unknown[][] {
  const rows: unknown[][] = [["id", "product", "amount"]];
  for (let i = 1; i <= count; i++) {
    rows.push([i, `item-${i}`, i * 10]);
  }
  return rows;
}
