#!/usr/bin/env tsx

/**
 * CLI entry point for the XLSX to CSV converter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("xlsx2csv")
  .description("Convert Excel .xlsx workbooks to CSV files")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option("-i, --input <path>", "Workbook file or directory to search recursively")
  .option("-o, --output <path>", "Output directory for CSV files")
  .option("-s, --sheet <sheet>", "Sheet index (zero-based) or sheet name")
  .option("-e, --encoding <encoding>", "Text encoding of the CSV files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--bom", "Write a byte order mark (UTF-8/UTF-16 only)")
  .option("--crlf", "Use CRLF line endings")
  .option("--stats", "Write stats.json to the output directory")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
