import type { StrategyConfig } from "../config/strategy-config.js";
import type { ValidationResult } from "../validator/types.js";

export const FIX_KINDS = [
  "walk_forward",
  "parameter_reduction",
  "multiple_testing_correction",
  "out_of_sample_enforcement",
] as const;

/** Automated remediation categories, listed in the order they are applied. */
export type FixKind = (typeof FIX_KINDS)[number];

export const BIAS_TYPES = ["selection_bias", "data_snooping", "curve_fitting", "chronological_violation"] as const;
export type BiasType = (typeof BIAS_TYPES)[number];

export interface RemediationPlan {
  detectedBiases: BiasType[];
  remediationSteps: string[];
  suggestedImprovements: string[];
  validationRecommendations: string[];
  summary: string;
}

export interface PlanDecision {
  fullPlan: RemediationPlan;
  /** Distinct automated categories, in FIX_KINDS order. Empty means nothing left to automate. */
  automatedSteps: FixKind[];
  /** Number of plan steps that need a human. */
  requiresManual: number;
}

export interface RemediationPlanner {
  plan(input: { config: StrategyConfig; validation: ValidationResult }): PlanDecision;
}
