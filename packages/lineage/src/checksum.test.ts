import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { createHash } from "node:crypto";
import { checksumFile } from "./checksum.js";

let tmpDir: string;

afterEach(() => {
  if (tmpDir && fs.existsSync(tmpDir)) {
    fs.rmSync(tmpDir, { recursive: true });
  }
});

describe("checksumFile", () => {
  it("returns the same digest for an unmodified file", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sum-"));
    const file = path.join(tmpDir, "config.json");
    fs.writeFileSync(file, '{"short":10,"long":40}');

    const first = checksumFile(file);
    const second = checksumFile(file);
    expect(first).toBe(second);
    expect(first).toBe(createHash("sha256").update('{"short":10,"long":40}').digest("hex"));
  });

  it("hashes files larger than one read chunk", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sum-"));
    const file = path.join(tmpDir, "big.csv");
    const content = "2024-01-01,100.5,101.2,99.8,100.9\n".repeat(5000);
    fs.writeFileSync(file, content);

    expect(checksumFile(file)).toBe(createHash("sha256").update(content).digest("hex"));
  });

  it("changes when the content changes", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sum-"));
    const file = path.join(tmpDir, "a.txt");
    fs.writeFileSync(file, "one");
    const before = checksumFile(file);
    fs.writeFileSync(file, "two");
    expect(checksumFile(file)).not.toBe(before);
  });

  it("returns null for a missing path without throwing", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sum-"));
    expect(checksumFile(path.join(tmpDir, "nope.json"))).toBeNull();
    expect(checksumFile(path.join(tmpDir, "nope", "deeper.json"))).toBeNull();
  });

  it("returns null for a directory", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "sum-"));
    expect(checksumFile(tmpDir)).toBeNull();
  });
});
