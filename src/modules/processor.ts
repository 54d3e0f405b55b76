/**
 * Processor Module
 * Converts files one at a time; a failing file never stops the batch
 */

import {
  describeError,
  pathExists,
  outputPathFor,
  readSheet,
  writeCsv,
  SheetNotFoundError,
  WorkbookParseError,
} from "../utils";
import type {
  ConversionContext,
  FileOutcome,
  ProcessingStage,
  SheetTable,
} from "../types";

function isParseError(error: unknown): boolean {
  return (
    error instanceof WorkbookParseError || error instanceof SheetNotFoundError
  );
}

/**
 * Record and report a per-file failure
 */
function fail(
  ctx: ConversionContext,
  source: string,
  error: unknown,
  stage: ProcessingStage,
): FileOutcome {
  const issue = ctx.tracker.trackFileError(source, error, stage);
  ctx.tracker.incrementFailed();

  const { message, trace } = describeError(error);
  ctx.reporter.report(
    trace
      ? `Error converting '${source}': ${message}\n${trace}`
      : `Error converting '${source}': ${message}`,
  );

  return {
    status: "failed",
    source,
    stage,
    reason: issue.reason,
    details: issue.details,
  };
}

/**
 * Convert a single workbook
 * Never throws: every problem becomes a skipped or failed outcome
 */
export async function convertFile(
  ctx: ConversionContext,
  source: string,
): Promise<FileOutcome> {
  const { request, reporter, tracker, writeOptions } = ctx;

  if (!writeOptions) {
    throw new Error("Write options must be resolved before processing");
  }

  // Best effort: the file can still disappear right after this check
  if (!(await pathExists(source))) {
    reporter.report(
      `Error: input file '${source}' no longer exists. Skipping.`,
    );
    tracker.incrementSkipped();
    return { status: "skipped", source, reason: "missing" };
  }

  let table: SheetTable;
  try {
    table = await readSheet(source, request.sheet);
  } catch (error) {
    return fail(ctx, source, error, isParseError(error) ? "parse" : "read");
  }

  reporter.report(
    `Read sheet '${table.sheetName}' from '${source}' (${table.rows.length} rows)`,
  );

  const output = outputPathFor(source, request.output);
  try {
    await writeCsv(table, output, writeOptions);
  } catch (error) {
    return fail(ctx, source, error, "write");
  }

  reporter.report(`Saved: ${output}`);
  tracker.incrementConverted(table.rows.length);

  return {
    status: "converted",
    source,
    output,
    sheet: table.sheetName,
    rows: table.rows.length,
  };
}

/**
 * Reads from context:
 * - files
 *
 * Writes to context:
 * - outcomes: One FileOutcome per file, in the same order
 */
export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const outcomes: FileOutcome[] = [];
  for (const source of ctx.files) {
    outcomes.push(await convertFile(ctx, source));
  }

  ctx.outcomes = outcomes;
}
