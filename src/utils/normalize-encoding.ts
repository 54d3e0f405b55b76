/**
 * Map a user-supplied encoding name onto an encoding iconv-lite can write
 */

import iconv from "iconv-lite";

export interface TextEncoding {
  encoding: string;
  bom: boolean;
}

const ALIASES = new Map<string, TextEncoding>([
  ["utf-8", { encoding: "utf8", bom: false }],
  ["utf-8-sig", { encoding: "utf8", bom: true }],
  ["utf8-sig", { encoding: "utf8", bom: true }],
  ["utf-16", { encoding: "utf16le", bom: true }],
]);

// Binary-to-text encodings are not text encodings
const EXCLUDED = new Set(["hex", "base64", "base64url"]);

// iconv-lite looks codecs up by this form of the name
function canonicalName(name: string): string {
  return name.toLowerCase().replace(/:\d{4}$|[^0-9a-z]/g, "");
}

/**
 * @returns undefined when no codec writes the encoding
 *
 * @example
 * normalizeEncoding("UTF-8") // { encoding: "utf8", bom: false }
 * normalizeEncoding("utf-8-sig") // { encoding: "utf8", bom: true }
 * normalizeEncoding("cp949") // { encoding: "cp949", bom: false }
 */
export function normalizeEncoding(name: string): TextEncoding | undefined {
  const key = name.trim().toLowerCase();

  const alias = ALIASES.get(key);
  if (alias) {
    return alias;
  }

  const canonical = canonicalName(key);
  // Codec tables are plain objects, so inherited keys like "constructor" would resolve
  if (canonical === "" || EXCLUDED.has(canonical) || canonical in Object.prototype) {
    return undefined;
  }

  return iconv.encodingExists(key) ? { encoding: key, bom: false } : undefined;
}

const UNICODE = new Set(["utf8", "utf16le", "utf16be", "ucs2"]);

/**
 * Byte order mark only makes sense for Unicode encodings
 */
export function supportsBom(encoding: string): boolean {
  return UNICODE.has(canonicalName(encoding));
}
