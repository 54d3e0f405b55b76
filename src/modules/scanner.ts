/**
 * Scanner Module
 * Discovers the workbooks to convert
 */

import { discoverFiles } from "../utils";
import type { ConversionContext } from "../types";

/**
 * Writes to context:
 * - files: Workbook paths in walk order
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const files = await discoverFiles(ctx.request.input);
  ctx.logger.debug(`Discovered ${files.length} workbook(s) in ${ctx.request.input}`);
  ctx.tracker.setTotalFiles(files.length);
  ctx.files = files;
}
