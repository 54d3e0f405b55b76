/**
 * File-related type definitions
 */

import type { FileIssueReason } from "../utils/tracker";

/**
 * Which sheet to read from each workbook.
 * Resolved against every file independently, so an index or name
 * may exist in one workbook and not in another.
 */
export type SheetSelector =
  | { kind: "index"; index: number }
  | { kind: "name"; name: string };

/**
 * One sheet loaded as text cells
 * Every row has exactly header.length cells
 */
export interface SheetTable {
  sheetName: string;
  header: string[];
  rows: string[][];
}

export type ProcessingStage = "read" | "parse" | "write";

export interface ConvertedFile {
  status: "converted";
  source: string; // Workbook path as discovered
  output: string; // Written CSV path
  sheet: string; // Resolved sheet name
  rows: number; // Data rows written (header excluded)
}

export interface SkippedFile {
  status: "skipped";
  source: string;
  reason: "missing"; // Deleted between discovery and conversion
}

export interface FailedFile {
  status: "failed";
  source: string;
  stage: ProcessingStage;
  reason: FileIssueReason;
  details: string;
}

export type FileOutcome = ConvertedFile | SkippedFile | FailedFile;
export type FileStatus = FileOutcome["status"];
