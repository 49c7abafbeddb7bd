import type { JobRow } from "@stratfix/lineage";

export type RetryDecision = "retry" | "failed";

/** Retry while the incremented count stays within the job's budget. */
export function decideRetry(job: Pick<JobRow, "retry_count" | "max_retries">): RetryDecision {
  return job.retry_count + 1 <= job.max_retries ? "retry" : "failed";
}
