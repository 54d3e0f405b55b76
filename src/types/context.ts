/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { CsvConfig } from "./config";
import type { FileOutcome, SheetSelector } from "./files";
import type { Tracker, ProcessingStats } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { Reporter } from "../utils/reporter";
import type { CsvWriteOptions } from "../utils/write-csv";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

/**
 * Parameters of a single run, as collected by the host
 */
export interface ConversionRequest {
  input: string; // Workbook file or directory to search recursively
  output: string; // Directory receiving the CSV files
  sheet: SheetSelector;
  encoding: string; // Text encoding name, e.g. "utf-8"
  csv?: Partial<CsvConfig>;
}

export type ConversionStatus = "completed" | "empty" | "aborted";

export interface ConversionSummary {
  status: ConversionStatus;
  input: string;
  output: string;
  files: string[];
  outcomes: FileOutcome[];
  stats: ProcessingStats;
}

export interface ConversionContext {
  // Input - provided at initialization
  request: ConversionRequest;

  // Guarded reporting channel, never throws
  reporter: Reporter;
  logger: Logger;

  // Unified tracking for stats and errors
  tracker: Tracker;

  writeOptions?: CsvWriteOptions; // Resolved during setup
  files?: string[]; // Discovered workbooks in walk order
  outcomes?: FileOutcome[]; // One per discovered file
}
