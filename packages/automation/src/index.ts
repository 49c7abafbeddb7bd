export {
  JOB_TYPES,
  JobFileSchema,
  StrategyBatchSpecSchema,
  UnsupportedJobType,
  parseJobSpec,
  type JobFile,
  type JobSpec,
  type JobType,
  type StrategyBatchJob,
} from "./domain/job-spec.js";
export { decideRetry, type RetryDecision } from "./domain/retry-policy.js";
export { fallbackScore, promoteResult } from "./domain/leaderboard.js";
export {
  AutomationWorker,
  type AutomationWorkerDeps,
  type JobRunSummary,
  type WorkerResult,
} from "./application/automation-worker.js";
export {
  AutomationController,
  type AutomationControllerDeps,
  type JobResolution,
} from "./application/automation-controller.js";
export { enqueueJobFile, leaderboardLines } from "./application/commands.js";
export { AppConfigSchema, ConfigError, loadConfig, type AppConfig, type ConfigLayer } from "./lib/config.js";
