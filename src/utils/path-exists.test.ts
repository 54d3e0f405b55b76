import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { symlink, writeFile } from "fs/promises";
import { join } from "node:path";
import { pathExists } from "./path-exists";
import { makeTempDir, removeDir } from "../test/workbook";

describe("pathExists", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("finds files and directories", async () => {
    await writeFile(join(dir, "book.xlsx"), "");

    expect(await pathExists(join(dir, "book.xlsx"))).toBe(true);
    expect(await pathExists(dir)).toBe(true);
    expect(await pathExists(join(dir, "missing.xlsx"))).toBe(false);
  });

  it("treats a dangling link as missing", async () => {
    const link = join(dir, "gone.xlsx");
    await symlink(join(dir, "nowhere.xlsx"), link);

    expect(await pathExists(link)).toBe(false);
  });
});
