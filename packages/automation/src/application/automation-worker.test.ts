import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { SqliteStore, type JobRow } from "@stratfix/lineage";
import {
  ValidationFailure,
  type StrategyConfig,
  type ValidationResult,
  type Validator,
} from "@stratfix/remediation";
import { UnsupportedJobType } from "../domain/job-spec.js";
import { AutomationWorker } from "./automation-worker.js";

function result(bias: number): ValidationResult {
  return {
    performance_metrics: { sharpe_ratio: 1, total_return: 0.02, max_drawdown: -0.1, total_trades: 30, win_rate: 0.5 },
    algorithm_results: { SELBIAS: { bias_metrics: { detected_bias: `Selection bias=${bias}` } } },
  };
}

class ScriptedValidator implements Validator {
  readonly calls: StrategyConfig[] = [];
  private script: Array<ValidationResult | Error>;

  constructor(script: Array<ValidationResult | Error>) {
    this.script = script;
  }

  async validate(config: StrategyConfig): Promise<ValidationResult> {
    this.calls.push(config);
    const next = this.script[this.calls.length - 1];
    if (!next) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  }
}

let workspace: string;
let outputsDir: string;
let store: SqliteStore;

function claim(jobType: string, specification: unknown): JobRow {
  store.enqueueJob({ jobType, specification });
  const job = store.fetchNextJob();
  if (!job) throw new Error("no job claimed");
  return job;
}

const batch = {
  specs: [
    {
      base_name: "sma_cross",
      strategy_type: "sma",
      template_path: "templates/sma.cpp",
      parameter_grid: { short: [5, 10] },
    },
  ],
  data_path: "bars.txt",
  max_iterations: 2,
};

const singleSpec = { ...batch.specs[0], parameter_grid: { short: [5] } };

beforeEach(() => {
  workspace = fs.mkdtempSync(path.join(os.tmpdir(), "worker-"));
  outputsDir = path.join(workspace, "outputs");
  fs.mkdirSync(path.join(workspace, "templates"));
  fs.writeFileSync(path.join(workspace, "templates", "sma.cpp"), "int main() { return 0; }\n");
  const rows = Array.from({ length: 20 }, (_, i) => `${20240101 + i} 100 101 99 100.5 1000`);
  fs.writeFileSync(path.join(workspace, "bars.txt"), rows.join("\n") + "\n");
  store = new SqliteStore();
});

afterEach(() => {
  store.close();
  fs.rmSync(workspace, { recursive: true });
});

describe("AutomationWorker", () => {
  it("remediates every generated variant and records a job run each", async () => {
    // variant 1: 0.2 then 0.04 (converged, success); variant 2: 0.06 (nothing to fix, needs review)
    const validator = new ScriptedValidator([result(0.2), result(0.04), result(0.06)]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir });
    const job = claim("strategy_batch", batch);

    const out = await worker.execute(job);

    expect(out.runs.map((r) => r.success)).toEqual([true, false]);
    expect(validator.calls.map((c) => c.name)).toEqual(["sma_cross_001", "sma_cross_001", "sma_cross_002"]);
    expect(store.listJobRuns(job.job_id).map((r) => r.status)).toEqual(["completed", "needs_review"]);
    expect(store.listJobRuns(job.job_id).map((r) => r.run_id)).toEqual(out.runs.map((r) => r.runId));
  });

  it("falls back to the configured iteration budget when the job sets none", async () => {
    const validator = new ScriptedValidator([result(0.3), result(0.25), result(0.2)]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir, settings: { maxIterations: 1 } });
    const job = claim("strategy_batch", { specs: [singleSpec], data_path: "bars.txt" });

    const out = await worker.execute(job);

    expect(validator.calls).toHaveLength(2);
    expect(out.runs).toHaveLength(1);
    expect(store.listJobRuns(job.job_id)[0]?.details).toContain('"state":"exhausted"');
  });

  it("lets the job's max_iterations override the configured budget", async () => {
    const validator = new ScriptedValidator([result(0.3), result(0.25), result(0.2)]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir, settings: { maxIterations: 1 } });
    await worker.execute(claim("strategy_batch", { specs: [singleSpec], data_path: "bars.txt", max_iterations: 0 }));

    expect(validator.calls).toHaveLength(1);
  });

  it("resolves the data path against the workspace", async () => {
    const validator = new ScriptedValidator([result(0.03), result(0.03)]);
    const paths: string[] = [];
    const recording: Validator = {
      validate: (config, dataPath) => {
        paths.push(dataPath);
        return validator.validate(config);
      },
    };
    const worker = new AutomationWorker({ store, validator: recording, workspace, outputsDir });

    await worker.execute(claim("strategy_batch", batch));

    expect(paths).toEqual([path.join(workspace, "bars.txt"), path.join(workspace, "bars.txt")]);
  });

  it("promotes only successful sessions to the leaderboard", async () => {
    const validator = new ScriptedValidator([result(0.2), result(0.04), result(0.06)]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir });

    const out = await worker.execute(claim("strategy_batch", batch));

    const [winner, loser] = out.runs;
    if (!winner || !loser) throw new Error("expected two runs");
    const entry = store.getLeaderboardEntry(winner.variantId);
    expect(entry).toMatchObject({ best_run_id: winner.runId, rank: 1, status: "candidate" });
    expect(entry?.score).toBeCloseTo(0.86, 10);
    expect(store.getLeaderboardEntry(loser.variantId)).toBeNull();
  });

  it("completes the generation experiment under the base strategy", async () => {
    const validator = new ScriptedValidator([result(0.03), result(0.03)]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir });
    const job = claim("strategy_batch", batch);

    await worker.execute(job);

    const strategy = store.getStrategyByName("sma_cross");
    expect(strategy?.template_source).toBe(path.join(workspace, "templates", "sma.cpp"));
    expect(store.getGenerationExperiment(1)).toMatchObject({
      strategy_id: strategy?.strategy_id,
      policy: "grid",
      status: "completed",
      notes: `job ${job.job_id}`,
    });
    expect(store.getGenerationExperiment(1)?.completed_at).not.toBeNull();
  });

  it("marks the experiment failed and rethrows when a session fails", async () => {
    const validator = new ScriptedValidator([new Error("runner crashed")]);
    const worker = new AutomationWorker({ store, validator, workspace, outputsDir });

    await expect(worker.execute(claim("strategy_batch", batch))).rejects.toThrow(ValidationFailure);

    const experiment = store.getGenerationExperiment(1);
    expect(experiment?.status).toBe("failed");
    expect(experiment?.notes).toMatch(/^ValidationFailure: /);
  });

  it("fails the experiment when the template is missing", async () => {
    fs.rmSync(path.join(workspace, "templates", "sma.cpp"));
    const worker = new AutomationWorker({ store, validator: new ScriptedValidator([]), workspace, outputsDir });

    await expect(worker.execute(claim("strategy_batch", batch))).rejects.toThrow("Template strategy not found");
    expect(store.getGenerationExperiment(1)?.status).toBe("failed");
  });

  it("rejects unsupported job types before touching the store", async () => {
    const worker = new AutomationWorker({ store, validator: new ScriptedValidator([]), workspace, outputsDir });

    await expect(worker.execute(claim("report", {}))).rejects.toThrow(UnsupportedJobType);
    expect(store.getGenerationExperiment(1)).toBeNull();
  });
});
