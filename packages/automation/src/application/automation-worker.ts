import path from "node:path";
import { z } from "zod";
import { formatError, logger, safeJsonParse } from "@stratfix/kit";
import type { JobRow, SqliteStore } from "@stratfix/lineage";
import {
  RemediationSession,
  StrategyFactory,
  type RemediationPlanner,
  type SessionSettings,
  type StrategySpec,
  type Validator,
} from "@stratfix/remediation";
import { parseJobSpec, type StrategyBatchJob } from "../domain/job-spec.js";
import { promoteResult } from "../domain/leaderboard.js";

const log = logger.createChild("automationWorker");

export interface AutomationWorkerDeps {
  store: SqliteStore;
  validator: Validator;
  planner?: RemediationPlanner;
  /** Base directory for relative template and data paths. */
  workspace: string;
  outputsDir: string;
  settings?: Partial<SessionSettings>;
}

export interface JobRunSummary {
  jobRunId: number;
  variantId: number;
  runId: number;
  success: boolean;
}

export interface WorkerResult {
  runs: JobRunSummary[];
}

/** Executes one claimed job to completion. Errors propagate to the controller. */
export class AutomationWorker {
  private deps: AutomationWorkerDeps;
  private factory: StrategyFactory;
  private session: RemediationSession;

  constructor(deps: AutomationWorkerDeps) {
    this.deps = deps;
    this.factory = new StrategyFactory({ workspace: deps.workspace, outputsDir: deps.outputsDir });
    this.session = new RemediationSession({
      store: deps.store,
      validator: deps.validator,
      planner: deps.planner,
      outputsDir: deps.outputsDir,
      settings: deps.settings,
    });
  }

  async execute(job: JobRow): Promise<WorkerResult> {
    const specification = safeJsonParse(job.specification, { schema: z.unknown() });
    const parsed = parseJobSpec(job.job_type, specification);
    return this.executeStrategyBatch(job, parsed);
  }

  private async executeStrategyBatch(job: JobRow, batch: StrategyBatchJob): Promise<WorkerResult> {
    const dataPath = path.resolve(this.deps.workspace, batch.dataPath);
    const runs: JobRunSummary[] = [];

    for (const spec of batch.specs) {
      runs.push(...(await this.executeSpec(job, batch, spec, dataPath)));
    }

    log.info(
      { action: "batchDone", jobId: job.job_id, runs: runs.length, succeeded: runs.filter((r) => r.success).length },
      "Strategy batch finished",
    );
    return { runs };
  }

  /** One spec entry: a generation experiment wrapping a session per generated variant. */
  private async executeSpec(
    job: JobRow,
    batch: StrategyBatchJob,
    spec: StrategySpec,
    dataPath: string,
  ): Promise<JobRunSummary[]> {
    const { store } = this.deps;
    const strategyId = store.upsertStrategy({
      family: spec.strategy_type,
      name: spec.base_name,
      templateSource: path.resolve(this.deps.workspace, spec.template_path),
    });
    const experimentId = store.startGenerationExperiment({
      strategyId,
      policy: batch.policy,
      parameters: {
        base_parameters: spec.base_parameters,
        parameter_grid: spec.parameter_grid,
        limit: spec.limit,
      },
      notes: `job ${job.job_id}`,
    });

    const runs: JobRunSummary[] = [];
    try {
      const configs = this.factory.generate(spec, batch.policy);
      for (const config of configs) {
        const result = await this.session.run({ config, dataPath, maxIterations: batch.maxIterations });
        const finalRun = result.iterations[result.iterations.length - 1];
        if (!finalRun) throw new Error(`session for ${config.name} recorded no runs`);

        const jobRunId = store.recordJobRun({
          jobId: job.job_id,
          variantId: result.variantId,
          runId: finalRun.runId,
          status: result.success ? "completed" : "needs_review",
          details: { summary: result.summary, success: result.success, state: result.state },
        });

        if (result.success) {
          const promoted = promoteResult(store, { variantId: result.variantId, runId: finalRun.runId });
          log.info(
            { action: "promoted", variantId: result.variantId, score: promoted.score, rank: promoted.rank },
            `Promoted ${config.name}`,
          );
        }
        runs.push({ jobRunId, variantId: result.variantId, runId: finalRun.runId, success: result.success });
      }
    } catch (err) {
      store.completeGenerationExperiment(experimentId, "failed", formatError(err));
      throw err;
    }

    store.completeGenerationExperiment(experimentId, "completed");
    return runs;
  }
}
