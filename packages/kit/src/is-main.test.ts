import { describe, it, expect, afterEach } from "vitest";
import { isMainModule } from "./is-main.js";

describe("isMainModule", () => {
  const originalArgv = process.argv;

  afterEach(() => {
    process.argv = originalArgv;
  });

  it("matches the entry script", () => {
    process.argv = ["node", "/srv/stratfix/packages/automation/src/cli.ts"];
    expect(isMainModule("file:///srv/stratfix/packages/automation/src/cli.ts")).toBe(true);
  });

  it("does not match an imported module", () => {
    process.argv = ["node", "/srv/stratfix/packages/automation/src/cli.ts"];
    expect(isMainModule("file:///srv/stratfix/packages/automation/src/lib/config.ts")).toBe(false);
  });

  it("is false without an entry script", () => {
    process.argv = ["node"];
    expect(isMainModule("file:///srv/stratfix/packages/automation/src/cli.ts")).toBe(false);
  });
});
