export type RunStatus = "pending" | "success" | "failed";
export type JobStatus = "pending" | "running" | "retry" | "failed" | "completed";
export type JobRunStatus = "completed" | "needs_review";
export type ExperimentStatus = "active" | "completed" | "failed";

export interface StrategyRow {
  strategy_id: number;
  family: string;
  name: string;
  template_source: string | null;
  notes: string | null;
  created_at: string;
}

export interface VariantRow {
  variant_id: number;
  strategy_id: number;
  parent_variant_id: number | null;
  version_tag: string | null;
  config_json: string;
  code_path: string | null;
  provenance: string | null;
  created_at: string;
}

export interface RunRow {
  run_id: number;
  variant_id: number;
  data_source: string;
  iteration: number;
  remediation_plan: string | null;
  start_time: string;
  end_time: string | null;
  status: RunStatus;
  error_message: string | null;
}

export interface RunMetricsRow {
  run_metric_id: number;
  run_id: number;
  sharpe_ratio: number | null;
  total_return: number | null;
  max_drawdown: number | null;
  win_rate: number | null;
  total_trades: number | null;
  bias_selection: number | null;
  bias_other: string | null;
  score: number | null;
  recorded_at: string;
}

export interface RemediationActionRow {
  action_id: number;
  run_id: number;
  action_type: string;
  description: string | null;
  metadata_json: string | null;
  created_at: string;
}

export interface ArtifactRow {
  artifact_id: number;
  run_id: number | null;
  variant_id: number | null;
  artifact_type: string;
  path: string;
  checksum: string | null;
  notes: string | null;
  created_at: string;
}

export interface LeaderboardRow {
  leaderboard_id: number;
  variant_id: number;
  best_run_id: number;
  rank: number;
  score: number;
  status: string;
  promoted_at: string;
}

export interface GenerationExperimentRow {
  experiment_id: number;
  strategy_id: number;
  policy: string;
  parameters_json: string | null;
  started_at: string;
  completed_at: string | null;
  status: ExperimentStatus;
  notes: string | null;
}

export interface JobRow {
  job_id: number;
  job_type: string;
  specification: string;
  status: JobStatus;
  priority: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  last_error: string | null;
  retry_count: number;
  max_retries: number;
}

export interface JobRunRow {
  job_run_id: number;
  job_id: number;
  variant_id: number | null;
  run_id: number | null;
  status: JobRunStatus;
  started_at: string;
  completed_at: string | null;
  details: string | null;
}

// ---------------------------------------------------------------------------
// Operation inputs
// ---------------------------------------------------------------------------

export interface StrategyInput {
  family: string;
  name: string;
  templateSource?: string | null;
  notes?: string | null;
}

export interface VariantInput {
  strategyId: number;
  config: Record<string, unknown>;
  parentVariantId?: number | null;
  versionTag?: string | null;
  codePath?: string | null;
  provenance?: string | null;
}

export interface OpenRunInput {
  variantId: number;
  dataSource: string;
  iteration: number;
  remediationPlan?: unknown;
}

export type RunClosure =
  | { status: "success" }
  | { status: "failed"; errorMessage: string };

/** Performance snapshot as reported by a validator. */
export interface PerformanceMetrics {
  sharpe_ratio: number;
  total_return: number;
  max_drawdown: number;
  win_rate: number | null;
  total_trades: number;
}

export interface MetricsInput {
  metrics: Partial<PerformanceMetrics>;
  biasSelection: number;
  biasOther?: unknown;
  score?: number | null;
}

export interface RemediationActionInput {
  actionType: string;
  description?: string | null;
  metadata?: unknown;
}

export interface ArtifactInput {
  runId?: number | null;
  variantId?: number | null;
  artifactType: string;
  path: string;
  notes?: string | null;
}

export interface LeaderboardInput {
  variantId: number;
  bestRunId: number;
  score: number;
  rank: number;
  status?: string;
}

export interface EnqueueJobInput {
  jobType: string;
  specification: unknown;
  priority?: number;
  maxRetries?: number;
}

/** What the caller decided about a finished job; the store applies it verbatim. */
export type JobOutcome =
  | { status: "completed" }
  | { status: "retry"; error: string }
  | { status: "failed"; error: string };

export interface JobRunInput {
  jobId: number;
  variantId?: number | null;
  runId?: number | null;
  status: JobRunStatus;
  details?: unknown;
}

export interface ExperimentInput {
  strategyId: number;
  policy: string;
  parameters?: unknown;
  notes?: string | null;
}

export interface LeaderboardQuery {
  topN?: number;
  status?: string;
  family?: string;
}

export interface LeaderboardView {
  leaderboard_id: number;
  variant_id: number;
  best_run_id: number;
  rank: number;
  score: number;
  status: string;
  promoted_at: string;
  family: string;
  strategy_name: string;
  version_tag: string | null;
  config: Record<string, unknown>;
  sharpe_ratio: number | null;
  total_return: number | null;
  max_drawdown: number | null;
  win_rate: number | null;
  total_trades: number | null;
  bias_selection: number | null;
}

export interface LeaderboardSummary {
  totalStrategies: number;
  activeEntries: number;
  averageSharpeRatio: number;
  averageTotalReturn: number;
  averageMaxDrawdown: number;
  averageWinRate: number;
  averageScore: number;
  bestScore: number;
  topPerformer: { name: string; score: number } | null;
}
