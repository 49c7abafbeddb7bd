import { describe, it, expect } from "vitest";
import { formatError } from "./format-error.js";

describe("formatError", () => {
  it("includes message and stack frames for Error instances", () => {
    const text = formatError(new Error("disk full"));
    expect(text.startsWith("Error: disk full")).toBe(true);
    expect(text).toContain("\n    at ");
  });

  it("uses the subclass name", () => {
    class RunnerCrash extends Error {
      constructor(message: string) {
        super(message);
        this.name = "RunnerCrash";
      }
    }
    expect(formatError(new RunnerCrash("exit 3"))).toContain("RunnerCrash: exit 3");
  });

  it("stringifies non-Error values", () => {
    expect(formatError("plain")).toBe("plain");
    expect(formatError(42)).toBe("42");
  });
});
