/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  CsvConfig,
  StatsConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Files
export type {
  SheetSelector,
  SheetTable,
  ProcessingStage,
  ConvertedFile,
  SkippedFile,
  FailedFile,
  FileOutcome,
  FileStatus,
} from "./files";

// Context
export type {
  ConversionContext,
  ConversionRequest,
  ConversionStatus,
  ConversionSummary,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
