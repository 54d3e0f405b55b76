/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type { ProcessingStage } from "../types/files";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason = "read-error" | "parse-error" | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalFiles: number;
  convertedFiles: number;
  failedFiles: number;
  skippedFiles: number;
  totalRows: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapFileError(
  error: unknown,
  stage: ProcessingStage,
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "read-error", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return {
        reason: stage === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  switch (stage) {
    case "read":
      return { reason: "read-error", details };
    case "parse":
      return { reason: "parse-error", details };
    case "write":
      return { reason: "write-error", details };
  }
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private convertedFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private totalRows = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementConverted(rows: number): void {
    this.convertedFiles++;
    this.totalRows += rows;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackFileError(
    path: string,
    error: unknown,
    stage: ProcessingStage,
  ): FileIssue {
    const { reason, details } = mapFileError(error, stage);
    const issue: FileIssue = { type: "file", path, reason, details };
    this.issues.push(issue);
    return issue;
  }

  trackResourceError(path: string, error: unknown): ResourceIssue {
    const { reason, details } = mapResourceError(error);
    const issue: ResourceIssue = { type: "resource", path, reason, details };
    this.issues.push(issue);
    return issue;
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues(type: "file"): FileIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      convertedFiles: this.convertedFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      totalRows: this.totalRows,
      issues: [...this.issues],
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<string> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalFiles: stats.totalFiles,
        convertedFiles: stats.convertedFiles,
        failedFiles: stats.failedFiles,
        skippedFiles: stats.skippedFiles,
        totalRows: stats.totalRows,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    return outputPath;
  }

  private groupIssuesByTypeAndReason(): {
    file: Record<string, FileIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      file: Record<string, FileIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      file: {},
      resource: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "file": {
          if (!grouped.file[issue.reason]) {
            grouped.file[issue.reason] = [];
          }
          grouped.file[issue.reason].push(issue);
          break;
        }
        case "resource": {
          if (!grouped.resource[issue.reason]) {
            grouped.resource[issue.reason] = [];
          }
          grouped.resource[issue.reason].push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
