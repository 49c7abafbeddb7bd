export {
  STRATEGY_TYPES,
  DEFAULT_PARAMS,
  StrategyConfigSchema,
  cliArgs,
  type StrategyConfig,
  type StrategyType,
  type ParamValue,
} from "./config/strategy-config.js";
export { StrategyFactory } from "./factory/strategy-factory.js";
export {
  GENERATION_POLICIES,
  StrategySpecSchema,
  type GenerationPolicy,
  type StrategySpec,
  type StrategySpecInput,
} from "./factory/types.js";
export { applyFixes, FIXES, FIX_LABELS, type FixContext, type FixHandler } from "./fixes/index.js";
export { BiasPlanner, identifyBiasTypes, loadPlaybook, type Playbook } from "./planner/bias-planner.js";
export {
  BIAS_TYPES,
  FIX_KINDS,
  type BiasType,
  type FixKind,
  type PlanDecision,
  type RemediationPlan,
  type RemediationPlanner,
} from "./planner/types.js";
export { RunnerValidator, type RunnerValidatorOptions } from "./validator/runner-validator.js";
export {
  PerformanceMetricsSchema,
  ValidationResultSchema,
  type PerformanceMetrics,
  type ValidateOptions,
  type ValidationResult,
  type Validator,
} from "./validator/types.js";
export { extractBiasMagnitude, parseBiasMagnitude } from "./loop/bias.js";
export { classifyError, type ErrorClass } from "./loop/classify-error.js";
export { ValidationFailure } from "./loop/errors.js";
export { computeScore, computeImprovement, type Improvement } from "./loop/scoring.js";
export { remediationMachine, type RemediationEvent, type RemediationStateValue } from "./loop/state-machine.js";
export {
  RemediationSession,
  DEFAULT_SESSION_SETTINGS,
  type IterationRecord,
  type SessionDeps,
  type SessionResult,
  type SessionSettings,
} from "./loop/session.js";
