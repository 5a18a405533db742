import fs from "node:fs";
import { Compression } from "../config";

export type CompressionFlag = Compression | "auto";

const GZIP_MAGIC = [0x1f, 0x8b];

export function parseCompressionFlag(raw: string | undefined): CompressionFlag | undefined {
  if (raw === "auto" || raw === "gzip" || raw === "none") {
    return raw;
  }
  return undefined;
}

function hasGzipMagic(filePath: string): boolean {
  const fd = fs.openSync(filePath, "r");
  try {
    const header = Buffer.alloc(GZIP_MAGIC.length);
    const read = fs.readSync(fd, header, 0, header.length, 0);
    return read === GZIP_MAGIC.length && header[0] === GZIP_MAGIC[0] && header[1] === GZIP_MAGIC[1];
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * An explicit flag always wins. `auto` trusts a `.gz` suffix, then sniffs the gzip magic bytes;
 * streams without a path are read as plain JSON.
 */
export function resolveCompression(flag: CompressionFlag, filePath?: string): Compression {
  if (flag !== "auto") {
    return flag;
  }
  if (!filePath) {
    return "none";
  }
  if (filePath.endsWith(".gz")) {
    return "gzip";
  }
  return hasGzipMagic(filePath) ? "gzip" : "none";
}
