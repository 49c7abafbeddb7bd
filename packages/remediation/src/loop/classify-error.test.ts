import { describe, it, expect } from "vitest";
import { classifyError } from "./classify-error.js";

describe("classifyError", () => {
  it("detects timeouts", () => {
    expect(classifyError("Validator timed out after 300000ms")).toBe("timeout");
    expect(classifyError("Command timeout")).toBe("timeout");
    expect(classifyError("ETIMEDOUT")).toBe("timeout");
  });

  it("detects network errors", () => {
    expect(classifyError("ECONNREFUSED 127.0.0.1:8080")).toBe("network");
    expect(classifyError("getaddrinfo ENOTFOUND example.invalid")).toBe("network");
  });

  it("detects transient errors", () => {
    expect(classifyError("spawn ./strategy_runner ENOENT")).toBe("transient");
    expect(classifyError("SQLITE_BUSY: database is locked")).toBe("transient");
  });

  it("returns unknown for anything else", () => {
    expect(classifyError("Command failed with exit code 2")).toBe("unknown");
    expect(classifyError("")).toBe("unknown");
  });
});
