import fs from "node:fs";
import path from "node:path";
import { execa } from "execa";
import { logger } from "@stratfix/kit";
import { cliArgs, type StrategyConfig } from "../config/strategy-config.js";
import { ensureBiasMetrics, parseRunnerOutput } from "./parse-runner-output.js";
import type { ValidateOptions, ValidationResult, Validator } from "./types.js";

const log = logger.createChild("runnerValidator");

export interface RunnerValidatorOptions {
  /** Path to the compiled strategy runner, absolute or relative to `workspace`. */
  runnerPath: string;
  workspace: string;
  timeoutMs?: number;
}

/**
 * Validates a config by running the external strategy runner on the data file
 * and reading the metrics block it prints.
 */
export class RunnerValidator implements Validator {
  private runnerPath: string;
  private workspace: string;
  private timeoutMs: number;

  constructor(opts: RunnerValidatorOptions) {
    this.workspace = opts.workspace;
    this.runnerPath = path.resolve(opts.workspace, opts.runnerPath);
    this.timeoutMs = opts.timeoutMs ?? 300_000;
  }

  async validate(config: StrategyConfig, dataPath: string, opts: ValidateOptions): Promise<ValidationResult> {
    if (!fs.existsSync(this.runnerPath)) {
      throw new Error(`strategy_runner not found at ${this.runnerPath}`);
    }

    const args = cliArgs(config, dataPath);
    log.debug({ action: "spawn", runner: this.runnerPath, args }, "Running strategy");

    const result = await execa(this.runnerPath, args, {
      cwd: this.workspace,
      timeout: this.timeoutMs,
      cancelSignal: opts.signal,
      reject: false,
    });

    if (result.timedOut) {
      throw new Error(`strategy_runner timed out after ${this.timeoutMs}ms`);
    }
    if (result.isCanceled) {
      throw new Error("strategy_runner was cancelled");
    }
    if (result.failed) {
      const reason = result.exitCode === undefined ? "could not be started" : `failed with exit code ${result.exitCode}`;
      throw new Error(`strategy_runner ${reason}:\n${result.stderr}`.trimEnd());
    }

    const metrics = parseRunnerOutput(result.stdout);
    return {
      performance_metrics: metrics,
      algorithm_results: ensureBiasMetrics(metrics, {}),
      raw_output: result.stdout,
    };
  }
}
