import { setTimeout as sleep } from "node:timers/promises";
import { formatError, logger } from "@stratfix/kit";
import { PersistenceFailure, type JobRow, type SqliteStore } from "@stratfix/lineage";
import { classifyError } from "@stratfix/remediation";
import { decideRetry } from "../domain/retry-policy.js";
import type { AutomationWorker } from "./automation-worker.js";

const log = logger.createChild("automationController");

export interface AutomationControllerDeps {
  store: SqliteStore;
  worker: Pick<AutomationWorker, "execute">;
  pollIntervalMs?: number;
}

export type JobResolution = "completed" | "retry" | "failed";

/**
 * Claims jobs from the queue one at a time and hands them to the worker.
 * Job failures are recorded on the job; store failures stop the controller.
 */
export class AutomationController {
  private deps: AutomationControllerDeps;
  private running = false;
  private idle: AbortController | null = null;

  constructor(deps: AutomationControllerDeps) {
    this.deps = deps;
  }

  /** Claims and processes at most one job. Returns false when the queue was empty. */
  async runOnce(): Promise<boolean> {
    const job = this.deps.store.fetchNextJob();
    if (!job) return false;
    await this.processJob(job);
    return true;
  }

  async runForever(): Promise<void> {
    this.running = true;
    const intervalMs = this.deps.pollIntervalMs ?? 5000;
    log.info({ action: "start", pollIntervalMs: intervalMs }, "Automation controller started");

    while (this.running) {
      const processed = await this.runOnce();
      if (!processed && this.running) {
        await this.waitForWork(intervalMs);
      }
    }
    log.info({ action: "stop" }, "Automation controller stopped");
  }

  /** Lets the current job finish, then ends runForever. */
  stop(): void {
    this.running = false;
    this.idle?.abort();
  }

  async processJob(job: JobRow): Promise<JobResolution> {
    const { store, worker } = this.deps;
    log.info(
      { action: "claimed", jobId: job.job_id, jobType: job.job_type, attempt: job.retry_count + 1 },
      `Processing job ${job.job_id}`,
    );

    try {
      const result = await worker.execute(job);
      store.completeJob(job.job_id, { status: "completed" });
      log.info({ action: "completed", jobId: job.job_id, runs: result.runs.length }, `Job ${job.job_id} completed`);
      return "completed";
    } catch (err) {
      if (err instanceof PersistenceFailure) throw err;

      const error = formatError(err);
      const decision = decideRetry(job);
      store.completeJob(job.job_id, { status: decision, error });
      log.error(
        {
          action: decision === "retry" ? "retryScheduled" : "failed",
          jobId: job.job_id,
          retryCount: job.retry_count,
          maxRetries: job.max_retries,
          errorClass: classifyError(error),
          err,
        },
        `Job ${job.job_id} ${decision === "retry" ? "will be retried" : "failed"}`,
      );
      return decision;
    }
  }

  private async waitForWork(intervalMs: number): Promise<void> {
    const idle = new AbortController();
    this.idle = idle;
    try {
      await sleep(intervalMs, undefined, { signal: idle.signal });
    } catch (err) {
      if (!idle.signal.aborted) throw err;
    } finally {
      this.idle = null;
    }
  }
}
