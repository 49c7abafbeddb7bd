import fs from "node:fs";
import { createHash } from "node:crypto";

const CHUNK_SIZE = 64 * 1024;

/**
 * SHA-256 hex digest of a file's bytes, read in fixed-size chunks.
 * Returns null when the path does not exist or is not a regular file.
 */
export function checksumFile(filePath: string): string | null {
  let fd: number;
  try {
    if (!fs.statSync(filePath).isFile()) return null;
    fd = fs.openSync(filePath, "r");
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }

  const hash = createHash("sha256");
  const buffer = Buffer.alloc(CHUNK_SIZE);
  try {
    let read = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
    while (read > 0) {
      hash.update(buffer.subarray(0, read));
      read = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
    }
  } finally {
    fs.closeSync(fd);
  }
  return hash.digest("hex");
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
