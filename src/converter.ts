/**
 * Converter - Pipeline orchestrator
 * Setup checks, discovery and per-file processing, with progress banners
 */

import { mkdir } from "fs/promises";
import path from "node:path";
import type {
  ConversionContext,
  ConversionRequest,
  ConversionStatus,
  ConversionSummary,
} from "./types";
import {
  Logger,
  Tracker,
  describeError,
  pathExists,
  guardReporter,
  loggerReporter,
  normalizeEncoding,
  WORKBOOK_EXTENSION,
  type Reporter,
} from "./utils";
import * as modules from "./modules";

export interface ConvertOptions {
  logger?: Logger;
  tracker?: Tracker;
}

function summarize(
  ctx: ConversionContext,
  status: ConversionStatus,
): ConversionSummary {
  return {
    status,
    input: ctx.request.input,
    output: ctx.request.output,
    files: ctx.files ?? [],
    outcomes: ctx.outcomes ?? [],
    stats: ctx.tracker.getStats(),
  };
}

/**
 * Convert every workbook found at `request.input` into a CSV file in `request.output`
 *
 * Problems with individual files are reported and recorded in the summary;
 * only setup failures (missing input, unusable output directory, unknown
 * encoding) end the run early, and those are reported rather than thrown.
 * Files are processed one after another.
 */
export async function convert(
  request: ConversionRequest,
  reporter?: Reporter,
  options: ConvertOptions = {},
): Promise<ConversionSummary> {
  const logger = options.logger ?? new Logger();
  const ctx: ConversionContext = {
    request,
    logger,
    tracker: options.tracker ?? new Tracker(),
    reporter: guardReporter(reporter ?? loggerReporter(logger), logger),
  };
  const report = (message: string): void => ctx.reporter.report(message);

  // 1. Input must exist
  if (!(await pathExists(request.input))) {
    report(`Error: input path '${request.input}' does not exist.`);
    return summarize(ctx, "aborted");
  }

  // 2. Encoding must be writable, checked before anything touches the disk
  const textEncoding = normalizeEncoding(request.encoding);
  if (!textEncoding) {
    report(`Error: unsupported encoding '${request.encoding}'.`);
    return summarize(ctx, "aborted");
  }
  ctx.writeOptions = {
    encoding: textEncoding.encoding,
    newline: request.csv?.newline ?? "\n",
    bom: textEncoding.bom || (request.csv?.bom ?? false),
  };

  // 3. Output directory is created once and shared by every file
  if (!(await pathExists(request.output))) {
    try {
      await mkdir(request.output, { recursive: true });
      report(`Created output directory: ${request.output}`);
    } catch (error) {
      report(`Failed to create output directory: ${describeError(error).message}`);
      return summarize(ctx, "aborted");
    }
  }

  // 4. Discovery
  await modules.scan(ctx);
  const files = ctx.files ?? [];

  if (files.length === 0) {
    report(`No ${WORKBOOK_EXTENSION} files found to convert.`);
    return summarize(ctx, "empty");
  }

  report(
    [
      `--- Starting conversion (${files.length} files) ---`,
      `Input path: ${path.resolve(request.input)}`,
      `Output directory: ${path.resolve(request.output)}`,
    ].join("\n"),
  );

  // 5. Per-file conversion
  await modules.process(ctx);

  report("--- Conversion complete ---");
  return summarize(ctx, "completed");
}
