/**
 * Convert command - Loads config and runs the conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import { convert } from "../../converter";
import * as modules from "../../modules";
import {
  loadConfig,
  parseSheetSelector,
  describeError,
  Logger,
  Tracker,
  type Reporter,
} from "../../utils";
import type { ConversionConfig } from "../../types";

export const ConvertOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  sheet: z.string().optional(),
  encoding: z.string().optional(),
  config: z.string().optional(),
  bom: z.boolean().optional(),
  crlf: z.boolean().optional(),
  stats: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

/**
 * Override config values with CLI options
 */
export function applyOptions(
  config: ConversionConfig,
  options: Options,
): ConversionConfig {
  return {
    ...config,
    input: options.input?.trim() || config.input,
    output: options.output?.trim() || config.output,
    sheet: options.sheet ?? config.sheet,
    encoding: options.encoding?.trim() || config.encoding || "utf-8",
    csv: {
      newline: options.crlf ? "\r\n" : config.csv.newline,
      bom: options.bom ?? config.csv.bom,
    },
    stats: { export: options.stats ?? config.stats.export },
    logging: { level: options.verbose ? "debug" : config.logging.level },
  };
}

/**
 * Returns a message for the first missing required setting
 */
export function missingSetting(config: ConversionConfig): string | null {
  if (!config.input) {
    return "Input path is required (--input)";
  }
  if (!config.output) {
    return "Output directory is required (--output)";
  }
  return null;
}

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI options
    const loaded = await loadConfig(options.config);
    const config = applyOptions(loaded.config, options);

    const missing = missingSetting(config);
    if (missing) {
      spinner.fail(missing);
      process.exitCode = 1;
      return;
    }

    const logger = new Logger(config.logging.level);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of loaded.errors) {
      tracker.trackResourceError(err.path, err.error);
    }

    // Print each message above the spinner as it arrives
    const reporter: Reporter = {
      report(message: string): void {
        spinner.clear();
        console.log(message);
        spinner.render();
      },
    };

    spinner.text = "Converting workbooks...";
    const summary = await convert(
      {
        input: config.input,
        output: config.output,
        sheet: parseSheetSelector(config.sheet),
        encoding: config.encoding,
        csv: config.csv,
      },
      reporter,
      { logger, tracker },
    );

    spinner.clear();
    spinner.stop();
    console.log("All tasks completed.");

    if (config.stats.export && summary.status !== "aborted") {
      const statsPath = await tracker.exportStats(config.output);
      logger.debug(`Stats written to ${statsPath}`);
    }

    modules.stats(summary.stats, {
      status: summary.status,
      verbose: options.verbose,
    });

    if (summary.status === "aborted" || summary.stats.failedFiles > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Unexpected error");
    const { message, trace } = describeError(error);
    console.error(`Unexpected error: ${message}`);
    if (trace) {
      console.error(trace);
    }
    process.exit(1);
  }
}
