/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const CsvConfigSchema = z.object({
  newline: z.enum(["\n", "\r\n"]),
  bom: z.boolean(),
});

export const StatsConfigSchema = z.object({
  // Write stats.json to the output directory after a run
  export: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: z.string(),
  output: z.string(),
  // Raw sheet selector as typed by the user: an index ("0") or a name ("Sheet2")
  sheet: z.string(),
  encoding: z.string(),
  csv: CsvConfigSchema,
  stats: StatsConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    csv: CsvConfigSchema.partial().optional(),
    stats: StatsConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type CsvConfig = z.infer<typeof CsvConfigSchema>;
export type StatsConfig = z.infer<typeof StatsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
