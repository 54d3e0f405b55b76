/**
 * Public API
 */

export { convert } from "./converter";
export type { ConvertOptions } from "./converter";
export {
  discoverFiles,
  parseSheetSelector,
  readSheet,
  writeCsv,
  serializeCsv,
  normalizeEncoding,
  guardReporter,
  loadConfig,
  MessageLog,
  Logger,
  Tracker,
  SheetNotFoundError,
  WorkbookParseError,
} from "./utils";
export type { Reporter, CsvWriteOptions } from "./utils";
export type {
  ConversionRequest,
  ConversionStatus,
  ConversionSummary,
  ConversionConfig,
  SheetSelector,
  SheetTable,
  FileOutcome,
  ConvertedFile,
  SkippedFile,
  FailedFile,
  ProcessingStats,
  Issue,
} from "./types";
