import fs from "node:fs";
import { describeZodError } from "@stratfix/kit";
import type { LeaderboardQuery, SqliteStore } from "@stratfix/lineage";
import { JobFileSchema, parseJobSpec } from "../domain/job-spec.js";

/**
 * Validates a job file and enqueues it. The specification is stored as
 * written; defaults are applied again when the worker decodes it.
 */
export function enqueueJobFile(store: SqliteStore, filePath: string): number {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(`Cannot read job file ${filePath}`, { cause: err });
  }

  const parsed = JobFileSchema.safeParse(json);
  if (!parsed.success) throw new Error(describeZodError(`Job file ${filePath}`, parsed.error));

  const file = parsed.data;
  parseJobSpec(file.job_type, file.specification);
  return store.enqueueJob({
    jobType: file.job_type,
    specification: file.specification,
    priority: file.priority,
    maxRetries: file.max_retries,
  });
}

/** One JSON document per leaderboard row, best score first. */
export function leaderboardLines(store: SqliteStore, query: LeaderboardQuery): string[] {
  return store.getLeaderboard(query).map((row) => JSON.stringify(row));
}
