/**
 * Workbook errors
 * Both are per-file failures classified as "parse" by the processor
 */

import type { SheetSelector } from "../types";

export class WorkbookParseError extends Error {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WorkbookParseError";
  }
}

export class SheetNotFoundError extends Error {
  constructor(
    readonly selector: SheetSelector,
    readonly available: string[],
  ) {
    super(
      `Worksheet ${describeSelector(selector)} not found (available: ${available.join(", ") || "none"})`,
    );
    this.name = "SheetNotFoundError";
  }
}

export function describeSelector(selector: SheetSelector): string {
  return selector.kind === "index"
    ? `index ${selector.index}`
    : `named '${selector.name}'`;
}

/**
 * Message and stack trace of anything thrown
 */
export function describeError(error: unknown): {
  message: string;
  trace?: string;
} {
  if (error instanceof Error) {
    return { message: error.message, trace: error.stack };
  }
  return { message: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
