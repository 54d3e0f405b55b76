import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readFile } from "fs/promises";
import iconv from "iconv-lite";
import { join } from "node:path";
import { serializeCsv, writeCsv } from "./write-csv";
import { normalizeEncoding } from "./normalize-encoding";
import { makeTempDir, removeDir } from "../test/workbook";

describe("serializeCsv", () => {
  it("writes a header line and one line per row", () => {
    const csv = serializeCsv({
      sheetName: "S",
      header: ["a", "b"],
      rows: [
        ["1", "x"],
        ["2", "y"],
      ],
    });

    expect(csv).toBe("a,b\n1,x\n2,y\n");
  });

  it("quotes delimiters and quotes", () => {
    const csv = serializeCsv({
      sheetName: "S",
      header: ["name", "quote"],
      rows: [["Widget, large", 'say "hi"']],
    });

    expect(csv).toBe('name,quote\n"Widget, large","say ""hi"""\n');
  });

  it("writes only the header for a sheet without rows", () => {
    expect(serializeCsv({ sheetName: "S", header: ["a", "b"], rows: [] })).toBe(
      "a,b\n",
    );
  });

  it("uses the requested line ending", () => {
    const csv = serializeCsv(
      { sheetName: "S", header: ["a"], rows: [["1"]] },
      "\r\n",
    );

    expect(csv).toBe("a\r\n1\r\n");
  });
});

describe("writeCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const table = { sheetName: "S", header: ["café"], rows: [] };

  it("encodes text with the given encoding", async () => {
    const file = join(dir, "latin1.csv");
    await writeCsv(table, file, { encoding: "latin1", newline: "\n", bom: false });

    expect([...(await readFile(file))]).toEqual([0x63, 0x61, 0x66, 0xe9, 0x0a]);
  });

  it("prefixes a byte order mark for UTF-8", async () => {
    const file = join(dir, "bom.csv");
    await writeCsv(table, file, { encoding: "utf8", newline: "\n", bom: true });

    const bytes = await readFile(file);
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString("utf8")).toBe("café\n");
  });

  it("prefixes a byte order mark for UTF-16", async () => {
    const file = join(dir, "utf16.csv");
    await writeCsv(table, file, { encoding: "utf16le", newline: "\n", bom: true });

    const bytes = await readFile(file);
    expect([...bytes.subarray(0, 2)]).toEqual([0xff, 0xfe]);
  });

  it("never writes a byte order mark for single-byte encodings", async () => {
    const file = join(dir, "latin1-bom.csv");
    await writeCsv(table, file, { encoding: "latin1", newline: "\n", bom: true });

    expect((await readFile(file)).length).toBe(5);
  });

  it("encodes Korean text as cp949", async () => {
    const file = join(dir, "cp949.csv");
    await writeCsv(
      { sheetName: "S", header: ["가"], rows: [["값"]] },
      file,
      { encoding: "cp949", newline: "\n", bom: true },
    );

    const bytes = await readFile(file);
    expect([...bytes.subarray(0, 3)]).toEqual([0xb0, 0xa1, 0x0a]);
    expect(iconv.decode(bytes, "cp949")).toBe("가\n값\n");
  });

  it("replaces an existing file", async () => {
    const file = join(dir, "out.csv");
    const options = { encoding: "utf8", newline: "\n", bom: false } as const;
    await writeCsv({ sheetName: "S", header: ["old"], rows: [["1"], ["2"]] }, file, options);
    await writeCsv({ sheetName: "S", header: ["new"], rows: [] }, file, options);

    expect(await readFile(file, "utf8")).toBe("new\n");
  });
});

describe("normalizeEncoding", () => {
  it("accepts common names regardless of case", () => {
    expect(normalizeEncoding("UTF-8")).toEqual({ encoding: "utf8", bom: false });
    expect(normalizeEncoding(" utf8 ")).toEqual({ encoding: "utf8", bom: false });
    expect(normalizeEncoding("latin1")).toEqual({
      encoding: "latin1",
      bom: false,
    });
  });

  it("maps utf-8-sig to UTF-8 with a byte order mark", () => {
    expect(normalizeEncoding("utf-8-sig")).toEqual({
      encoding: "utf8",
      bom: true,
    });
  });

  it("accepts legacy code pages", () => {
    expect(normalizeEncoding("cp949")).toEqual({ encoding: "cp949", bom: false });
    expect(normalizeEncoding("EUC-KR")).toEqual({ encoding: "euc-kr", bom: false });
  });

  it("rejects unknown and binary-to-text encodings", () => {
    expect(normalizeEncoding("no-such-codec")).toBeUndefined();
    expect(normalizeEncoding("base64")).toBeUndefined();
    expect(normalizeEncoding("")).toBeUndefined();
  });

  it("rejects names of built-in object properties", () => {
    for (const name of ["constructor", "toString", "valueOf", "__proto__"]) {
      expect(normalizeEncoding(name)).toBeUndefined();
    }
  });
});
