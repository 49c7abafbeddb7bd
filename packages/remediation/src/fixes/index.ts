import type { StrategyConfig } from "../config/strategy-config.js";
import { FIX_KINDS, type FixKind } from "../planner/types.js";
import { multipleTestingCorrection } from "./multiple-testing.js";
import { outOfSampleEnforcement } from "./out-of-sample.js";
import { parameterReduction } from "./parameter-reduction.js";
import { walkForward } from "./walk-forward.js";
import type { FixContext, FixHandler } from "./types.js";

export const FIXES: Record<FixKind, FixHandler> = {
  walk_forward: walkForward,
  parameter_reduction: parameterReduction,
  multiple_testing_correction: multipleTestingCorrection,
  out_of_sample_enforcement: outOfSampleEnforcement,
};

export const FIX_LABELS: Record<FixKind, string> = {
  walk_forward: "Walk-forward optimization applied",
  parameter_reduction: "Parameter space reduction applied",
  multiple_testing_correction: "Multiple testing corrections applied",
  out_of_sample_enforcement: "Out-of-sample validation enforced",
};

/**
 * Applies each requested fix once, in FIX_KINDS order regardless of the
 * order requested. Returns the resulting config and the fixes applied.
 */
export function applyFixes(
  config: StrategyConfig,
  kinds: readonly FixKind[],
  ctx: FixContext,
): { config: StrategyConfig; applied: FixKind[] } {
  const requested = new Set(kinds);
  const applied: FixKind[] = [];
  let current = config;
  for (const kind of FIX_KINDS) {
    if (!requested.has(kind)) continue;
    current = FIXES[kind](current, ctx);
    applied.push(kind);
  }
  return { config: current, applied };
}

export type { FixContext, FixHandler } from "./types.js";
