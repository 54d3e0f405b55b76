import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readFile } from "fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { Tracker } from "./tracker";
import { makeTempDir, removeDir } from "../test/workbook";

function codedError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("Tracker", () => {
  describe("file errors", () => {
    it("classifies missing files as read errors", () => {
      const tracker = new Tracker();
      const issue = tracker.trackFileError(
        "a.xlsx",
        codedError("ENOENT: no such file", "ENOENT"),
        "write",
      );

      expect(issue).toEqual({
        type: "file",
        path: "a.xlsx",
        reason: "read-error",
        details: "ENOENT: no such file",
      });
    });

    it("classifies permission errors by stage", () => {
      const tracker = new Tracker();
      const denied = codedError("EACCES: permission denied", "EACCES");

      expect(tracker.trackFileError("a", denied, "write").reason).toBe(
        "write-error",
      );
      expect(tracker.trackFileError("b", denied, "read").reason).toBe(
        "read-error",
      );
    });

    it("falls back to the stage", () => {
      const tracker = new Tracker();

      expect(tracker.trackFileError("a", new Error("bad"), "parse").reason).toBe(
        "parse-error",
      );
      expect(tracker.trackFileError("b", "oops", "write")).toEqual({
        type: "file",
        path: "b",
        reason: "write-error",
        details: "oops",
      });
    });
  });

  describe("resource errors", () => {
    it("classifies schema and JSON errors", () => {
      const tracker = new Tracker();
      const result = z.object({ a: z.string() }).safeParse({});
      expect(result.success).toBe(false);

      expect(tracker.trackResourceError("x.json", result.error).reason).toBe(
        "schema-validation",
      );
      expect(
        tracker.trackResourceError("y.json", new SyntaxError("Unexpected token"))
          .reason,
      ).toBe("invalid-json");
      expect(
        tracker.trackResourceError("z.json", new Error("EACCES")).reason,
      ).toBe("read-error");
      expect(tracker.getIssues("resource")).toHaveLength(3);
      expect(tracker.getIssues("file")).toHaveLength(0);
    });
  });

  describe("stats", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it("counts outcomes and rows", () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(4);
      tracker.incrementConverted(10);
      tracker.incrementConverted(5);
      tracker.incrementFailed();
      tracker.incrementSkipped();

      expect(tracker.getStats()).toMatchObject({
        totalFiles: 4,
        convertedFiles: 2,
        failedFiles: 1,
        skippedFiles: 1,
        totalRows: 15,
        issues: [],
      });
    });

    it("exports stats.json grouped by reason", async () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(1);
      tracker.incrementFailed();
      tracker.trackFileError("bad.xlsx", new Error("broken"), "parse");

      const path = await tracker.exportStats(dir);
      const exported = JSON.parse(await readFile(path, "utf-8"));

      expect(path).toBe(join(dir, "stats.json"));
      expect(exported.summary).toMatchObject({ totalFiles: 1, failedFiles: 1 });
      expect(exported.issues.file["parse-error"]).toEqual([
        {
          type: "file",
          path: "bad.xlsx",
          reason: "parse-error",
          details: "broken",
        },
      ]);
      expect(exported.issues.resource).toEqual({});
    });
  });
});
