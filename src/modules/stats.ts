/**
 * Stats Module
 * Displays processing statistics and issues with formatting
 */

import chalk from "chalk";
import type {
  ConversionStatus,
  ProcessingStats,
  FileIssue,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

interface StatsOptions {
  status: ConversionStatus;
  verbose?: boolean;
}

/**
 * Display processing statistics to console
 */
export function stats(summary: ProcessingStats, options: StatsOptions): void {
  const hasErrors = summary.failedFiles > 0 || options.status === "aborted";
  const hasWarnings = summary.skippedFiles > 0 || summary.issues.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title =
    options.status === "aborted" ? "Conversion Aborted" : "Conversion Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayFilesSection(summary);
  displayIssuesSection(summary, options.verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  if (stats.totalFiles === 0) {
    return;
  }

  console.log(sectionHeader("Files"));

  const bar = progressBar(stats.convertedFiles, stats.totalFiles);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.convertedFiles, chalk.green),
  );
  console.log(statRow(chalk.cyan("◉"), "Rows", stats.totalRows, chalk.cyan));

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedFiles, chalk.yellow),
    );
  }
}

function displayIssuesSection(stats: ProcessingStats, verbose?: boolean): void {
  const fileIssues = stats.issues.filter(
    (issue): issue is FileIssue => issue.type === "file",
  );
  const resourceIssues = stats.issues.filter(
    (issue): issue is ResourceIssue => issue.type === "resource",
  );

  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        console.log(`        ${chalk.dim(`${issue.reason}: ${issue.details}`)}`);
      }
    }
  }

  // Config files that failed to load; defaults were used instead
  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Configs ignored",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
