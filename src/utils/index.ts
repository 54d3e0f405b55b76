/**
 * Utility exports
 */

// Discovery and paths
export {
  discoverFiles,
  isWorkbookPath,
  WORKBOOK_EXTENSION,
} from "./discover-files";
export { outputPathFor, CSV_EXTENSION } from "./output-path";

// Workbook reading
export { parseSheetSelector } from "./parse-sheet-selector";
export {
  readSheet,
  loadWorkbook,
  resolveSheetName,
  toSheetTable,
  buildHeader,
  formatCell,
} from "./read-sheet";

// CSV writing
export { writeCsv, serializeCsv, encodeCsv } from "./write-csv";
export type { CsvWriteOptions } from "./write-csv";
export { normalizeEncoding, supportsBom } from "./normalize-encoding";
export type { TextEncoding } from "./normalize-encoding";

// Errors
export {
  WorkbookParseError,
  SheetNotFoundError,
  describeSelector,
  describeError,
  toError,
} from "./errors";

// Filesystem utilities
export { pathExists } from "./path-exists";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Reporting
export { guardReporter, loggerReporter, MessageLog } from "./reporter";
export type { Reporter } from "./reporter";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
