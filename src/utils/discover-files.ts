/**
 * Workbook discovery
 * A single workbook path yields itself; anything else is walked as a directory
 */

import glob from "fast-glob";
import { stat } from "fs/promises";
import path from "node:path";

export const WORKBOOK_EXTENSION = ".xlsx";

export function isWorkbookPath(file: string): boolean {
  return file.toLowerCase().endsWith(WORKBOOK_EXTENSION);
}

/**
 * Find every .xlsx file under `inputPath` (case-insensitive, recursive)
 *
 * Results keep the walk order. A missing path yields an empty list.
 * Symbolic links are followed without cycle detection beyond fast-glob's own.
 *
 * @example
 * await discoverFiles("data/report.xlsx") // ["/abs/data/report.xlsx"]
 * await discoverFiles("data") // ["data/a.xlsx", "data/sub/b.XLSX"]
 */
export async function discoverFiles(inputPath: string): Promise<string[]> {
  const stats = await stat(inputPath).catch(() => null);

  if (stats?.isFile()) {
    return isWorkbookPath(inputPath) ? [path.resolve(inputPath)] : [];
  }

  const entries = await glob(`**/*${WORKBOOK_EXTENSION}`, {
    cwd: inputPath,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: true,
  });

  return entries.map((entry) => path.join(inputPath, entry));
}
