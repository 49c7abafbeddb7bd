import { createActor } from "xstate";
import pTimeout from "p-timeout";
import { logger } from "@stratfix/kit";
import type { RemediationActionInput, SqliteStore } from "@stratfix/lineage";
import { metadataSection, type StrategyConfig } from "../config/strategy-config.js";
import { applyFixes, FIX_LABELS } from "../fixes/index.js";
import { BiasPlanner } from "../planner/bias-planner.js";
import type { FixKind, RemediationPlan, RemediationPlanner } from "../planner/types.js";
import { ValidationResultSchema, type ValidationResult, type Validator } from "../validator/types.js";
import { extractBiasMagnitude } from "./bias.js";
import { classifyError } from "./classify-error.js";
import { ValidationFailure } from "./errors.js";
import { computeImprovement, computeScore, isSuccessful, type Improvement } from "./scoring.js";
import { writeConfigSnapshot } from "./snapshot.js";
import { remediationMachine } from "./state-machine.js";
import { buildSessionSummary } from "./summary.js";

const log = logger.createChild("remediationSession");

export interface SessionSettings {
  maxIterations: number;
  biasFloor: number;
  successRatio: number;
  selectionBiasThreshold: number;
  validatorTimeoutMs: number;
}

export const DEFAULT_SESSION_SETTINGS: SessionSettings = {
  maxIterations: 3,
  biasFloor: 0.05,
  successRatio: 0.5,
  selectionBiasThreshold: 0.08,
  validatorTimeoutMs: 300_000,
};

export interface SessionDeps {
  store: SqliteStore;
  validator: Validator;
  /** Defaults to a BiasPlanner using `settings.selectionBiasThreshold`. */
  planner?: RemediationPlanner;
  outputsDir: string;
  settings?: Partial<SessionSettings>;
}

export interface IterationRecord {
  /** 0 for the baseline. */
  iteration: number;
  variantId: number;
  runId: number;
  configPath: string;
  config: StrategyConfig;
  validation: ValidationResult;
  biasMagnitude: number;
  appliedFixes: FixKind[];
  improvement: Improvement | null;
  plan: RemediationPlan | null;
}

export interface SessionResult {
  state: "converged" | "exhausted";
  success: boolean;
  strategyId: number;
  /** Final variant. */
  variantId: number;
  iterations: IterationRecord[];
  finalConfig: StrategyConfig;
  finalConfigPath: string;
  latestPlan: RemediationPlan | null;
  initialBias: number;
  finalBias: number;
  summary: string;
}

interface StepInput {
  variantId: number;
  config: StrategyConfig;
  dataPath: string;
  iteration: number;
  plan: RemediationPlan | null;
  actions: RemediationActionInput[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Strategy name shared by every variant a factory batch produced from one spec entry. */
function strategyName(config: StrategyConfig): string {
  const baseName = metadataSection(config, "factory").base_strategy_name;
  return typeof baseName === "string" && baseName.length > 0 ? baseName : config.name;
}

/**
 * Data file a variant is validated on: the out-of-sample split once that fix
 * has been applied to it or an ancestor, otherwise the session's data file.
 */
function validationDataPath(config: StrategyConfig, sessionDataPath: string): string {
  const dataset = metadataSection(config, "oos_validation").dataset;
  return typeof dataset === "string" && dataset.length > 0 ? dataset : sessionDataPath;
}

function templateSource(config: StrategyConfig): string | null {
  const template = metadataSection(config, "factory").template_path;
  return typeof template === "string" ? template : config.source;
}

/** Algorithm results other than the selection-bias detector, stored alongside the metrics. */
function otherBiasResults(validation: ValidationResult): Record<string, unknown> | undefined {
  const rest = Object.fromEntries(Object.entries(validation.algorithm_results).filter(([key]) => key !== "SELBIAS"));
  return Object.keys(rest).length > 0 ? rest : undefined;
}

/**
 * Runs one baseline validation and up to `maxIterations` remediation
 * iterations for a strategy config, recording every variant, run, metric,
 * action and artifact in the lineage store.
 */
export class RemediationSession {
  private store: SqliteStore;
  private validator: Validator;
  private planner: RemediationPlanner;
  private outputsDir: string;
  private settings: SessionSettings;

  constructor(deps: SessionDeps) {
    this.store = deps.store;
    this.validator = deps.validator;
    this.outputsDir = deps.outputsDir;
    this.settings = { ...DEFAULT_SESSION_SETTINGS, ...deps.settings };
    this.planner = deps.planner ?? new BiasPlanner({ selectionBiasThreshold: this.settings.selectionBiasThreshold });
  }

  async run(input: { config: StrategyConfig; dataPath: string; maxIterations?: number }): Promise<SessionResult> {
    const startedAt = Date.now();
    const { dataPath } = input;
    const maxIterations = input.maxIterations ?? this.settings.maxIterations;

    const actor = createActor(remediationMachine, {
      input: { maxIterations, biasFloor: this.settings.biasFloor },
    });
    actor.start();

    const name = strategyName(input.config);
    const strategyId = this.store.upsertStrategy({
      family: input.config.strategy_type,
      name,
      templateSource: templateSource(input.config),
    });

    // BASELINE
    const rootVariantId = this.store.createVariant({
      strategyId,
      config: input.config,
      versionTag: "baseline",
      codePath: input.config.source,
      provenance: "initial",
    });
    log.info({ action: "baseline", strategy: name, variantId: rootVariantId, maxIterations }, "Validating baseline");

    let baseline: IterationRecord;
    try {
      baseline = await this.step({
        variantId: rootVariantId,
        config: input.config,
        dataPath: validationDataPath(input.config, dataPath),
        iteration: 0,
        plan: null,
        actions: [],
      });
    } catch (err) {
      actor.send({ type: "BASELINE_FAILED", error: errorMessage(err) });
      throw err;
    }
    actor.send({ type: "BASELINE_OK", bias: baseline.biasMagnitude });

    const iterations: IterationRecord[] = [baseline];
    let current = baseline;
    let latestPlan: RemediationPlan | null = null;

    // ITERATING
    while (actor.getSnapshot().matches("iterating")) {
      const iteration = actor.getSnapshot().context.iteration + 1;
      const decision = this.planner.plan({ config: current.config, validation: current.validation });
      latestPlan = decision.fullPlan;

      if (decision.automatedSteps.length === 0) {
        log.info(
          { action: "planEmpty", iteration, requiresManual: decision.requiresManual },
          "No automated remediation left",
        );
        actor.send({ type: "PLAN_EMPTY" });
        break;
      }

      let record: IterationRecord;
      try {
        const fixed = applyFixes(current.config, decision.automatedSteps, {
          dataPath,
          outputsDir: this.outputsDir,
          iteration,
        });
        const variantId = this.store.createVariant({
          strategyId,
          config: fixed.config,
          parentVariantId: current.variantId,
          versionTag: `iter${iteration}`,
          codePath: fixed.config.source,
          provenance: fixed.applied.map((k) => FIX_LABELS[k]).join("; "),
        });
        record = await this.step({
          variantId,
          config: fixed.config,
          dataPath: validationDataPath(fixed.config, dataPath),
          iteration,
          plan: decision.fullPlan,
          actions: fixed.applied.map((k) => ({
            actionType: k,
            description: FIX_LABELS[k],
            metadata: { iteration, detectedBiases: decision.fullPlan.detectedBiases },
          })),
        });
        record.appliedFixes = fixed.applied;
      } catch (err) {
        actor.send({ type: "ITERATION_FAILED", error: errorMessage(err) });
        throw err;
      }

      record.improvement = computeImprovement(
        { metrics: current.validation.performance_metrics, bias: current.biasMagnitude },
        { metrics: record.validation.performance_metrics, bias: record.biasMagnitude },
      );
      iterations.push(record);
      current = record;

      log.info(
        {
          action: "iteration",
          iteration,
          variantId: record.variantId,
          bias: record.biasMagnitude,
          fixes: record.appliedFixes,
          improvement: record.improvement,
        },
        `Iteration ${iteration} complete`,
      );
      actor.send({ type: "ITERATION_OK", bias: record.biasMagnitude });
    }

    const snap = actor.getSnapshot();
    const state = snap.matches("converged") ? "converged" : "exhausted";
    const initialBias = baseline.biasMagnitude;
    const finalBias = current.biasMagnitude;
    const success = isSuccessful(initialBias, finalBias, this.settings);

    const finalConfigPath = writeConfigSnapshot(
      this.outputsDir,
      `${current.config.name}_final_v${current.variantId}.json`,
      current.config,
    );
    this.store.recordArtifact({
      runId: null,
      variantId: current.variantId,
      artifactType: "final_config",
      path: finalConfigPath,
      notes: `session ${state}`,
    });

    const summary = buildSessionSummary({
      strategy: name,
      state,
      success,
      initialBias,
      finalBias,
      durationMs: Date.now() - startedAt,
      iterations: iterations.map((r) => ({
        iteration: r.iteration,
        biasMagnitude: r.biasMagnitude,
        metrics: r.validation.performance_metrics,
        appliedFixes: r.appliedFixes,
      })),
      planSummary: latestPlan?.summary,
    });

    log.info(
      { action: "sessionEnd", strategy: name, state, success, initialBias, finalBias, iterations: iterations.length - 1 },
      `Session ${state}`,
    );

    actor.stop();
    return {
      state,
      success,
      strategyId,
      variantId: current.variantId,
      iterations,
      finalConfig: current.config,
      finalConfigPath,
      latestPlan,
      initialBias,
      finalBias,
      summary,
    };
  }

  /**
   * One validated attempt, persisted in order: open run, validate, close run,
   * metrics, remediation actions, config snapshot.
   */
  private async step(input: StepInput): Promise<IterationRecord> {
    const { variantId, config, dataPath, iteration } = input;
    const runId = this.store.openRun({
      variantId,
      dataSource: dataPath,
      iteration,
      remediationPlan: input.plan ?? undefined,
    });

    const validation = await this.validate(config, dataPath).catch((err: unknown) => {
      const message = errorMessage(err);
      log.error({ action: "validate", runId, iteration, errorClass: classifyError(message), err }, "Validation failed");
      this.store.closeRun(runId, { status: "failed", errorMessage: message });
      throw new ValidationFailure(runId, message, { cause: err });
    });

    this.store.closeRun(runId, { status: "success" });
    const biasMagnitude = extractBiasMagnitude(validation);
    this.store.recordMetrics(runId, {
      metrics: validation.performance_metrics,
      biasSelection: biasMagnitude,
      biasOther: otherBiasResults(validation),
      score: computeScore(validation.performance_metrics, biasMagnitude),
    });
    for (const action of input.actions) {
      this.store.recordRemediationAction(runId, action);
    }

    const suffix = iteration === 0 ? "baseline" : `iter${iteration}`;
    const configPath = writeConfigSnapshot(this.outputsDir, `${config.name}_${suffix}_run${runId}.json`, config);
    this.store.recordArtifact({ runId, variantId, artifactType: "config_snapshot", path: configPath });

    return {
      iteration,
      variantId,
      runId,
      configPath,
      config,
      validation,
      biasMagnitude,
      appliedFixes: [],
      improvement: null,
      plan: input.plan,
    };
  }

  /** Calls the validator under the configured timeout, aborting it when the timeout fires. */
  private async validate(config: StrategyConfig, dataPath: string): Promise<ValidationResult> {
    const controller = new AbortController();
    const milliseconds = this.settings.validatorTimeoutMs;
    try {
      const raw = await pTimeout(this.validator.validate(config, dataPath, { signal: controller.signal }), {
        milliseconds,
        message: `Validator timed out after ${milliseconds}ms`,
      });
      return ValidationResultSchema.parse(raw);
    } catch (err) {
      controller.abort(err);
      throw err;
    }
  }
}
