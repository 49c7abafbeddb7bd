import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { safeJsonParse, stableStringify } from "@stratfix/kit";
import { SCHEMA_SQL } from "./schema.js";
import { PersistenceFailure } from "./errors.js";
import { checksumFile } from "./checksum.js";
import type {
  ArtifactInput,
  ArtifactRow,
  EnqueueJobInput,
  ExperimentInput,
  GenerationExperimentRow,
  JobOutcome,
  JobRow,
  JobRunInput,
  JobRunRow,
  LeaderboardInput,
  LeaderboardQuery,
  LeaderboardRow,
  LeaderboardSummary,
  LeaderboardView,
  MetricsInput,
  OpenRunInput,
  RemediationActionInput,
  RemediationActionRow,
  RunClosure,
  RunMetricsRow,
  RunRow,
  StrategyInput,
  StrategyRow,
  VariantInput,
  VariantRow,
} from "./types.js";

const NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

const ConfigSchema = z.record(z.string(), z.unknown());

type LeaderboardViewRow = Omit<LeaderboardView, "config"> & { config_json: string };

export interface SqliteStoreOptions {
  /** File path, or ":memory:" for a private in-process database. */
  dbPath?: string;
  /** How long a writer waits for a competing lock before failing. */
  busyTimeoutMs?: number;
}

function toFailure(operation: string, err: unknown): PersistenceFailure {
  if (err instanceof PersistenceFailure) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PersistenceFailure(operation, message, { cause: err });
}

function openDatabase(dbPath: string, busyTimeoutMs: number): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath, { timeout: busyTimeoutMs });
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA_SQL);
    return db;
  } catch (err) {
    throw toFailure("open", err);
  }
}

function jsonOrNull(value: unknown): string | null {
  return value === undefined || value === null ? null : stableStringify(value);
}

/**
 * Lineage & metrics store. Every public mutation runs inside its own
 * `BEGIN IMMEDIATE` transaction, so concurrent processes sharing one file
 * serialize on the write lock instead of interleaving.
 */
export class SqliteStore {
  private db: Database.Database;

  constructor(opts: SqliteStoreOptions = {}) {
    this.db = openDatabase(opts.dbPath ?? ":memory:", opts.busyTimeoutMs ?? 5000);
  }

  close(): void {
    this.db.close();
  }

  private write<T>(operation: string, fn: () => T): T {
    try {
      return this.db.transaction(fn).immediate();
    } catch (err) {
      throw toFailure(operation, err);
    }
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toFailure(operation, err);
    }
  }

  // -------------------------------------------------------------------------
  // Strategies & variants
  // -------------------------------------------------------------------------

  upsertStrategy(input: StrategyInput): number {
    return this.write("upsertStrategy", () => {
      const row = this.db.prepare<
        { family: string; name: string; template_source: string | null; notes: string | null },
        { strategy_id: number }
      >(`
        INSERT INTO strategies (family, name, template_source, notes)
        VALUES (@family, @name, @template_source, @notes)
        ON CONFLICT(name) DO UPDATE SET
          family = excluded.family,
          template_source = COALESCE(excluded.template_source, strategies.template_source),
          notes = COALESCE(excluded.notes, strategies.notes)
        RETURNING strategy_id
      `).get({
        family: input.family,
        name: input.name,
        template_source: input.templateSource ?? null,
        notes: input.notes ?? null,
      });
      if (!row) throw new PersistenceFailure("upsertStrategy", `no id returned for ${input.name}`);
      return row.strategy_id;
    });
  }

  createVariant(input: VariantInput): number {
    return this.write("createVariant", () => {
      const parentId = input.parentVariantId ?? null;
      if (parentId !== null) {
        const parent = this.getVariant(parentId);
        if (!parent) {
          throw new PersistenceFailure("createVariant", `parent variant ${parentId} does not exist`);
        }
        if (parent.strategy_id !== input.strategyId) {
          throw new PersistenceFailure(
            "createVariant",
            `parent variant ${parentId} belongs to strategy ${parent.strategy_id}, not ${input.strategyId}`,
          );
        }
      }

      const result = this.db.prepare(`
        INSERT INTO strategy_variants (strategy_id, parent_variant_id, version_tag, config_json, code_path, provenance)
        VALUES (@strategy_id, @parent_variant_id, @version_tag, @config_json, @code_path, @provenance)
      `).run({
        strategy_id: input.strategyId,
        parent_variant_id: parentId,
        version_tag: input.versionTag ?? null,
        config_json: stableStringify(input.config),
        code_path: input.codePath ?? null,
        provenance: input.provenance ?? null,
      });
      return Number(result.lastInsertRowid);
    });
  }

  getStrategyByName(name: string): StrategyRow | null {
    return this.read("getStrategyByName", () =>
      this.db.prepare<[string], StrategyRow>("SELECT * FROM strategies WHERE name = ?").get(name) ?? null,
    );
  }

  getVariant(variantId: number): VariantRow | null {
    return this.read("getVariant", () =>
      this.db.prepare<[number], VariantRow>("SELECT * FROM strategy_variants WHERE variant_id = ?").get(variantId) ?? null,
    );
  }

  /** Parsed config snapshot of a variant. */
  getVariantConfig(variantId: number): Record<string, unknown> | null {
    const variant = this.getVariant(variantId);
    return variant ? safeJsonParse(variant.config_json, { schema: ConfigSchema }) : null;
  }

  listVariants(strategyId: number): VariantRow[] {
    return this.read("listVariants", () =>
      this.db.prepare<[number], VariantRow>(
        "SELECT * FROM strategy_variants WHERE strategy_id = ? ORDER BY variant_id",
      ).all(strategyId),
    );
  }

  /** Ancestry of a variant, root first, ending with the variant itself. */
  getLineage(variantId: number): VariantRow[] {
    return this.read("getLineage", () =>
      this.db.prepare<[number], VariantRow>(`
        WITH RECURSIVE chain(variant_id, parent_variant_id, depth) AS (
          SELECT variant_id, parent_variant_id, 0 FROM strategy_variants WHERE variant_id = ?
          UNION ALL
          SELECT v.variant_id, v.parent_variant_id, chain.depth + 1
            FROM strategy_variants v
            JOIN chain ON v.variant_id = chain.parent_variant_id
        )
        SELECT v.* FROM chain
          JOIN strategy_variants v ON v.variant_id = chain.variant_id
         ORDER BY chain.depth DESC
      `).all(variantId),
    );
  }

  // -------------------------------------------------------------------------
  // Runs, metrics, actions, artifacts
  // -------------------------------------------------------------------------

  openRun(input: OpenRunInput): number {
    return this.write("openRun", () => {
      const result = this.db.prepare(`
        INSERT INTO strategy_runs (variant_id, data_source, iteration, remediation_plan, status)
        VALUES (@variant_id, @data_source, @iteration, @remediation_plan, 'pending')
      `).run({
        variant_id: input.variantId,
        data_source: input.dataSource,
        iteration: input.iteration,
        remediation_plan: jsonOrNull(input.remediationPlan),
      });
      return Number(result.lastInsertRowid);
    });
  }

  /** Moves a pending run to its terminal status. A run closes exactly once. */
  closeRun(runId: number, closure: RunClosure): void {
    this.write("closeRun", () => {
      const result = this.db.prepare(`
        UPDATE strategy_runs
           SET status = @status, end_time = ${NOW}, error_message = @error_message
         WHERE run_id = @run_id AND status = 'pending'
      `).run({
        run_id: runId,
        status: closure.status,
        error_message: closure.status === "failed" ? closure.errorMessage : null,
      });
      if (result.changes === 0) {
        throw new PersistenceFailure("closeRun", `run ${runId} is not open`);
      }
    });
  }

  getRun(runId: number): RunRow | null {
    return this.read("getRun", () =>
      this.db.prepare<[number], RunRow>("SELECT * FROM strategy_runs WHERE run_id = ?").get(runId) ?? null,
    );
  }

  listRuns(variantId: number): RunRow[] {
    return this.read("listRuns", () =>
      this.db.prepare<[number], RunRow>(
        "SELECT * FROM strategy_runs WHERE variant_id = ? ORDER BY run_id",
      ).all(variantId),
    );
  }

  recordMetrics(runId: number, input: MetricsInput): number {
    return this.write("recordMetrics", () => {
      const run = this.getRun(runId);
      if (!run) throw new PersistenceFailure("recordMetrics", `run ${runId} does not exist`);
      if (run.status !== "success") {
        throw new PersistenceFailure("recordMetrics", `run ${runId} is ${run.status}, metrics need a successful run`);
      }

      const m = input.metrics;
      const result = this.db.prepare(`
        INSERT INTO run_metrics (run_id, sharpe_ratio, total_return, max_drawdown, win_rate, total_trades,
                                 bias_selection, bias_other, score)
        VALUES (@run_id, @sharpe_ratio, @total_return, @max_drawdown, @win_rate, @total_trades,
                @bias_selection, @bias_other, @score)
      `).run({
        run_id: runId,
        sharpe_ratio: m.sharpe_ratio ?? null,
        total_return: m.total_return ?? null,
        max_drawdown: m.max_drawdown ?? null,
        win_rate: m.win_rate ?? null,
        total_trades: m.total_trades ?? null,
        bias_selection: input.biasSelection,
        bias_other: jsonOrNull(input.biasOther),
        score: input.score ?? null,
      });
      return Number(result.lastInsertRowid);
    });
  }

  /** Latest metrics snapshot recorded for a run. */
  getRunMetrics(runId: number): RunMetricsRow | null {
    return this.read("getRunMetrics", () =>
      this.db.prepare<[number], RunMetricsRow>(
        "SELECT * FROM run_metrics WHERE run_id = ? ORDER BY run_metric_id DESC LIMIT 1",
      ).get(runId) ?? null,
    );
  }

  recordRemediationAction(runId: number, input: RemediationActionInput): number {
    return this.write("recordRemediationAction", () => {
      const result = this.db.prepare(`
        INSERT INTO remediation_actions (run_id, action_type, description, metadata_json)
        VALUES (@run_id, @action_type, @description, @metadata_json)
      `).run({
        run_id: runId,
        action_type: input.actionType,
        description: input.description ?? null,
        metadata_json: jsonOrNull(input.metadata),
      });
      return Number(result.lastInsertRowid);
    });
  }

  listRemediationActions(runId: number): RemediationActionRow[] {
    return this.read("listRemediationActions", () =>
      this.db.prepare<[number], RemediationActionRow>(
        "SELECT * FROM remediation_actions WHERE run_id = ? ORDER BY action_id",
      ).all(runId),
    );
  }

  recordArtifact(input: ArtifactInput): number {
    const checksum = this.read("recordArtifact", () => checksumFile(input.path));
    return this.write("recordArtifact", () => {
      const result = this.db.prepare(`
        INSERT INTO artifacts (run_id, variant_id, artifact_type, path, checksum, notes)
        VALUES (@run_id, @variant_id, @artifact_type, @path, @checksum, @notes)
      `).run({
        run_id: input.runId ?? null,
        variant_id: input.variantId ?? null,
        artifact_type: input.artifactType,
        path: input.path,
        checksum,
        notes: input.notes ?? null,
      });
      return Number(result.lastInsertRowid);
    });
  }

  listArtifacts(filter: { runId?: number; variantId?: number } = {}): ArtifactRow[] {
    return this.read("listArtifacts", () => {
      const conditions: string[] = [];
      const params: number[] = [];
      if (filter.runId !== undefined) {
        conditions.push("run_id = ?");
        params.push(filter.runId);
      }
      if (filter.variantId !== undefined) {
        conditions.push("variant_id = ?");
        params.push(filter.variantId);
      }
      const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
      return this.db.prepare<number[], ArtifactRow>(
        `SELECT * FROM artifacts${where} ORDER BY artifact_id`,
      ).all(...params);
    });
  }

  // -------------------------------------------------------------------------
  // Leaderboard
  // -------------------------------------------------------------------------

  /** One row per variant: a second call for the same variant updates it in place. */
  upsertLeaderboardEntry(input: LeaderboardInput): number {
    return this.write("upsertLeaderboardEntry", () => {
      const run = this.getRun(input.bestRunId);
      if (!run || run.variant_id !== input.variantId) {
        throw new PersistenceFailure(
          "upsertLeaderboardEntry",
          `run ${input.bestRunId} is not a run of variant ${input.variantId}`,
        );
      }

      const row = this.db.prepare<
        { variant_id: number; best_run_id: number; rank: number; score: number; status: string },
        { leaderboard_id: number }
      >(`
        INSERT INTO strategy_leaderboard (variant_id, best_run_id, rank, score, status)
        VALUES (@variant_id, @best_run_id, @rank, @score, @status)
        ON CONFLICT(variant_id) DO UPDATE SET
          best_run_id = excluded.best_run_id,
          rank = excluded.rank,
          score = excluded.score,
          status = excluded.status,
          promoted_at = ${NOW}
        RETURNING leaderboard_id
      `).get({
        variant_id: input.variantId,
        best_run_id: input.bestRunId,
        rank: input.rank,
        score: input.score,
        status: input.status ?? "candidate",
      });
      if (!row) throw new PersistenceFailure("upsertLeaderboardEntry", "no id returned");
      return row.leaderboard_id;
    });
  }

  nextLeaderboardRank(): number {
    return this.read("nextLeaderboardRank", () => {
      const row = this.db.prepare<[], { next_rank: number }>(
        "SELECT COALESCE(MAX(rank), 0) + 1 AS next_rank FROM strategy_leaderboard",
      ).get();
      return row?.next_rank ?? 1;
    });
  }

  getLeaderboardEntry(variantId: number): LeaderboardRow | null {
    return this.read("getLeaderboardEntry", () =>
      this.db.prepare<[number], LeaderboardRow>(
        "SELECT * FROM strategy_leaderboard WHERE variant_id = ?",
      ).get(variantId) ?? null,
    );
  }

  getLeaderboard(query: LeaderboardQuery = {}): LeaderboardView[] {
    return this.read("getLeaderboard", () => {
      const conditions: string[] = [];
      const params: (string | number)[] = [];
      if (query.status) {
        conditions.push("lb.status = ?");
        params.push(query.status);
      }
      if (query.family) {
        conditions.push("s.family = ?");
        params.push(query.family);
      }
      let sql = `
        SELECT lb.leaderboard_id, lb.variant_id, lb.best_run_id, lb.rank, lb.score, lb.status, lb.promoted_at,
               s.family, s.name AS strategy_name, sv.version_tag, sv.config_json,
               rm.sharpe_ratio, rm.total_return, rm.max_drawdown, rm.win_rate, rm.total_trades, rm.bias_selection
          FROM strategy_leaderboard lb
          JOIN strategy_variants sv ON lb.variant_id = sv.variant_id
          JOIN strategies s ON sv.strategy_id = s.strategy_id
          LEFT JOIN run_metrics rm ON rm.run_metric_id =
               (SELECT MAX(run_metric_id) FROM run_metrics WHERE run_id = lb.best_run_id)
      `;
      if (conditions.length > 0) sql += ` WHERE ${conditions.join(" AND ")}`;
      sql += " ORDER BY lb.score DESC, lb.leaderboard_id ASC";
      if (query.topN !== undefined) {
        sql += " LIMIT ?";
        params.push(query.topN);
      }

      const rows = this.db.prepare<(string | number)[], LeaderboardViewRow>(sql).all(...params);
      return rows.map(({ config_json, ...rest }) => ({
        ...rest,
        config: safeJsonParse(config_json, { schema: ConfigSchema }),
      }));
    });
  }

  getLeaderboardSummary(): LeaderboardSummary {
    return this.read("getLeaderboardSummary", () => {
      const counts = this.db.prepare<[], { strategies: number; active: number }>(`
        SELECT (SELECT COUNT(*) FROM strategies) AS strategies,
               (SELECT COUNT(*) FROM strategy_leaderboard WHERE status = 'active') AS active
      `).get();

      const averages = this.db.prepare<[], {
        avg_sharpe: number | null;
        avg_return: number | null;
        avg_drawdown: number | null;
        avg_win_rate: number | null;
        avg_score: number | null;
        best_score: number | null;
      }>(`
        SELECT AVG(rm.sharpe_ratio) AS avg_sharpe,
               AVG(rm.total_return) AS avg_return,
               AVG(rm.max_drawdown) AS avg_drawdown,
               AVG(rm.win_rate) AS avg_win_rate,
               AVG(lb.score) AS avg_score,
               MAX(lb.score) AS best_score
          FROM strategy_leaderboard lb
          JOIN run_metrics rm ON rm.run_metric_id =
               (SELECT MAX(run_metric_id) FROM run_metrics WHERE run_id = lb.best_run_id)
         WHERE lb.status = 'active'
      `).get();

      const top = this.db.prepare<[], { name: string; score: number }>(`
        SELECT s.name, lb.score
          FROM strategy_leaderboard lb
          JOIN strategy_variants sv ON lb.variant_id = sv.variant_id
          JOIN strategies s ON sv.strategy_id = s.strategy_id
         ORDER BY lb.score DESC, lb.leaderboard_id ASC
         LIMIT 1
      `).get();

      return {
        totalStrategies: counts?.strategies ?? 0,
        activeEntries: counts?.active ?? 0,
        averageSharpeRatio: averages?.avg_sharpe ?? 0,
        averageTotalReturn: averages?.avg_return ?? 0,
        averageMaxDrawdown: averages?.avg_drawdown ?? 0,
        averageWinRate: averages?.avg_win_rate ?? 0,
        averageScore: averages?.avg_score ?? 0,
        bestScore: averages?.best_score ?? 0,
        topPerformer: top ?? null,
      };
    });
  }

  // -------------------------------------------------------------------------
  // Generation experiments
  // -------------------------------------------------------------------------

  startGenerationExperiment(input: ExperimentInput): number {
    return this.write("startGenerationExperiment", () => {
      const result = this.db.prepare(`
        INSERT INTO generation_experiments (strategy_id, policy, parameters_json, status, notes)
        VALUES (@strategy_id, @policy, @parameters_json, 'active', @notes)
      `).run({
        strategy_id: input.strategyId,
        policy: input.policy,
        parameters_json: jsonOrNull(input.parameters),
        notes: input.notes ?? null,
      });
      return Number(result.lastInsertRowid);
    });
  }

  completeGenerationExperiment(
    experimentId: number,
    status: "completed" | "failed",
    notes?: string,
  ): void {
    this.write("completeGenerationExperiment", () => {
      this.db.prepare(`
        UPDATE generation_experiments
           SET status = @status, completed_at = ${NOW}, notes = COALESCE(@notes, notes)
         WHERE experiment_id = @experiment_id
      `).run({ experiment_id: experimentId, status, notes: notes ?? null });
    });
  }

  getGenerationExperiment(experimentId: number): GenerationExperimentRow | null {
    return this.read("getGenerationExperiment", () =>
      this.db.prepare<[number], GenerationExperimentRow>(
        "SELECT * FROM generation_experiments WHERE experiment_id = ?",
      ).get(experimentId) ?? null,
    );
  }

  // -------------------------------------------------------------------------
  // Automation jobs
  // -------------------------------------------------------------------------

  enqueueJob(input: EnqueueJobInput): number {
    return this.write("enqueueJob", () => {
      const result = this.db.prepare(`
        INSERT INTO automation_jobs (job_type, specification, status, priority, max_retries)
        VALUES (@job_type, @specification, 'pending', @priority, @max_retries)
      `).run({
        job_type: input.jobType,
        specification: stableStringify(input.specification),
        priority: input.priority ?? 0,
        max_retries: input.maxRetries ?? 3,
      });
      return Number(result.lastInsertRowid);
    });
  }

  /**
   * Claims the highest-priority eligible job (FIFO within a priority band)
   * and marks it running. Select and update are one statement inside an
   * immediate transaction, so two callers can never receive the same job.
   */
  fetchNextJob(): JobRow | null {
    return this.write("fetchNextJob", () =>
      this.db.prepare<[], JobRow>(`
        UPDATE automation_jobs
           SET status = 'running', started_at = ${NOW}
         WHERE job_id = (
           SELECT job_id FROM automation_jobs
            WHERE status IN ('pending', 'retry')
            ORDER BY priority DESC, job_id ASC
            LIMIT 1
         )
        RETURNING *
      `).get() ?? null,
    );
  }

  /** Applies the caller's decision to a running job. */
  completeJob(jobId: number, outcome: JobOutcome): void {
    this.write("completeJob", () => {
      let result: Database.RunResult;
      if (outcome.status === "completed") {
        result = this.db.prepare(`
          UPDATE automation_jobs
             SET status = 'completed', completed_at = ${NOW}, last_error = NULL
           WHERE job_id = ? AND status = 'running'
        `).run(jobId);
      } else if (outcome.status === "failed") {
        result = this.db.prepare(`
          UPDATE automation_jobs
             SET status = 'failed', completed_at = ${NOW}, last_error = ?
           WHERE job_id = ? AND status = 'running'
        `).run(outcome.error, jobId);
      } else {
        result = this.db.prepare(`
          UPDATE automation_jobs
             SET status = 'retry', last_error = ?, retry_count = retry_count + 1
           WHERE job_id = ? AND status = 'running'
        `).run(outcome.error, jobId);
      }
      if (result.changes === 0) {
        throw new PersistenceFailure("completeJob", `job ${jobId} is not running`);
      }
    });
  }

  getJob(jobId: number): JobRow | null {
    return this.read("getJob", () =>
      this.db.prepare<[number], JobRow>("SELECT * FROM automation_jobs WHERE job_id = ?").get(jobId) ?? null,
    );
  }

  recordJobRun(input: JobRunInput): number {
    return this.write("recordJobRun", () => {
      const result = this.db.prepare(`
        INSERT INTO automation_job_runs (job_id, variant_id, run_id, status, completed_at, details)
        VALUES (@job_id, @variant_id, @run_id, @status, ${NOW}, @details)
      `).run({
        job_id: input.jobId,
        variant_id: input.variantId ?? null,
        run_id: input.runId ?? null,
        status: input.status,
        details: jsonOrNull(input.details),
      });
      return Number(result.lastInsertRowid);
    });
  }

  listJobRuns(jobId: number): JobRunRow[] {
    return this.read("listJobRuns", () =>
      this.db.prepare<[number], JobRunRow>(
        "SELECT * FROM automation_job_runs WHERE job_id = ? ORDER BY job_run_id",
      ).all(jobId),
    );
  }
}
