import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { DEFAULT_PARAMS, type StrategyConfig } from "../config/strategy-config.js";
import { RunnerValidator } from "./runner-validator.js";

const config: StrategyConfig = {
  name: "sma_demo",
  strategy_type: "sma",
  parameters: { ...DEFAULT_PARAMS.sma },
  metadata: {},
  source: null,
};

let workspace: string;

function writeRunner(body: string): string {
  const file = path.join(workspace, "strategy_runner");
  fs.writeFileSync(file, `#!/usr/bin/env node\n${body}\n`);
  fs.chmodSync(file, 0o755);
  return file;
}

function signal(): AbortSignal {
  return new AbortController().signal;
}

beforeEach(() => {
  workspace = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "runner-")));
});

afterEach(() => {
  fs.rmSync(workspace, { recursive: true });
});

describe("RunnerValidator", () => {
  it("passes flags in order and parses the metrics block", async () => {
    writeRunner(
      [
        'console.log("Args: " + process.argv.slice(2).join(" "));',
        'console.log("Cwd: " + process.cwd());',
        'console.log("Total Return: 2.00%");',
        'console.log("Sharpe Ratio: 1.25");',
        'console.log("Max Drawdown: -8.00%");',
        'console.log("Total Trades: 42");',
        'console.log("Win Rate: 55.00%");',
      ].join("\n"),
    );
    const validator = new RunnerValidator({ runnerPath: "strategy_runner", workspace });

    const result = await validator.validate(config, "/data/bars.txt", { signal: signal() });

    const lines = (result.raw_output ?? "").split("\n");
    expect(lines[0]).toBe("Args: sma /data/bars.txt --short 10 --long 40 --fee 0.0005 --symbol DEMO");
    expect(lines[1]).toBe(`Cwd: ${workspace}`);
    expect(result.performance_metrics).toEqual({
      total_return: 0.02,
      sharpe_ratio: 1.25,
      max_drawdown: -0.08,
      total_trades: 42,
      win_rate: 0.55,
    });
    expect(result.algorithm_results).toEqual({
      SELBIAS: { bias_metrics: { detected_bias: "OOS=0.0050  Selection bias=0.2900  t=1.875" } },
    });
  });

  it("fails on a non-zero exit with the runner's stderr", async () => {
    writeRunner('console.error("bad data file"); process.exit(3);');
    const validator = new RunnerValidator({ runnerPath: "strategy_runner", workspace });

    await expect(validator.validate(config, "/data/bars.txt", { signal: signal() })).rejects.toThrow(
      "strategy_runner failed with exit code 3:\nbad data file",
    );
  });

  it("fails when the runner is missing", async () => {
    const validator = new RunnerValidator({ runnerPath: "missing_runner", workspace });
    await expect(validator.validate(config, "/data/bars.txt", { signal: signal() })).rejects.toThrow(
      `strategy_runner not found at ${path.join(workspace, "missing_runner")}`,
    );
  });

  it("kills a runner that exceeds its timeout", async () => {
    writeRunner("setTimeout(() => {}, 10_000);");
    const validator = new RunnerValidator({ runnerPath: "strategy_runner", workspace, timeoutMs: 200 });

    await expect(validator.validate(config, "/data/bars.txt", { signal: signal() })).rejects.toThrow(
      "strategy_runner timed out after 200ms",
    );
  });

  it("stops the runner when the caller aborts", async () => {
    writeRunner("setTimeout(() => {}, 10_000);");
    const validator = new RunnerValidator({ runnerPath: "strategy_runner", workspace });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    await expect(validator.validate(config, "/data/bars.txt", { signal: controller.signal })).rejects.toThrow(
      "strategy_runner was cancelled",
    );
  });
});
