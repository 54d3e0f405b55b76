import path from "node:path";

export const CSV_EXTENSION = ".csv";

/**
 * Target CSV path for a workbook: same base name, directly in `outputDir`
 *
 * @example
 * outputPathFor("in/sub/Sales.XLSX", "out") // "out/Sales.csv"
 */
export function outputPathFor(source: string, outputDir: string): string {
  const baseName = path.basename(source, path.extname(source));
  return path.join(outputDir, `${baseName}${CSV_EXTENSION}`);
}
