import { describe, it, expect } from "vitest";
import { BiasPlanner, identifyBiasTypes, loadPlaybook } from "./bias-planner.js";
import type { ValidationResult } from "../validator/types.js";

function validation(opts: {
  bias?: number;
  totalReturn?: number;
  trades?: number;
  chronological?: boolean;
}): ValidationResult {
  return {
    performance_metrics: {
      sharpe_ratio: 1,
      total_return: opts.totalReturn ?? 0.01,
      max_drawdown: -0.05,
      total_trades: opts.trades ?? 12,
      win_rate: 0.5,
    },
    algorithm_results:
      opts.bias === undefined
        ? {}
        : { SELBIAS: { bias_metrics: { detected_bias: `OOS=0.0000  Selection bias=${opts.bias}  t=0.000` } } },
    chronological_violations: opts.chronological,
  };
}

describe("identifyBiasTypes", () => {
  it("flags selection bias above the threshold only", () => {
    expect(identifyBiasTypes(validation({ bias: 0.081 }), 0.08)).toEqual(["selection_bias"]);
    expect(identifyBiasTypes(validation({ bias: 0.08 }), 0.08)).toEqual([]);
  });

  it("flags curve fitting for large returns over few trades", () => {
    expect(identifyBiasTypes(validation({ totalReturn: 0.06, trades: 9 }), 0.08)).toEqual(["curve_fitting"]);
    expect(identifyBiasTypes(validation({ totalReturn: -0.06, trades: 3 }), 0.08)).toEqual(["curve_fitting"]);
    expect(identifyBiasTypes(validation({ totalReturn: 0.06, trades: 10 }), 0.08)).toEqual([]);
  });

  it("flags data snooping when many trades all clear the win threshold", () => {
    // 0.05 / 25 = 0.002 per trade: every trade is a significant win, p = 0
    expect(identifyBiasTypes(validation({ totalReturn: 0.05, trades: 25 }), 0.08)).toEqual(["data_snooping"]);
  });

  it("does not flag data snooping with 20 or fewer trades", () => {
    expect(identifyBiasTypes(validation({ totalReturn: 0.05, trades: 20 }), 0.08)).toEqual([]);
  });

  it("reports chronological violations from the validator", () => {
    expect(identifyBiasTypes(validation({ chronological: true }), 0.08)).toEqual(["chronological_violation"]);
  });
});

describe("BiasPlanner", () => {
  const planner = new BiasPlanner();

  it("returns all four automated categories for selection bias, in fixed order", () => {
    const decision = planner.plan({ validation: validation({ bias: 0.12 }) });
    expect(decision.fullPlan.detectedBiases).toEqual(["selection_bias"]);
    expect(decision.automatedSteps).toEqual([
      "walk_forward",
      "parameter_reduction",
      "multiple_testing_correction",
      "out_of_sample_enforcement",
    ]);
    expect(decision.requiresManual).toBe(0);
    expect(decision.fullPlan.remediationSteps).toHaveLength(4);
  });

  it("returns an empty plan when nothing is detected", () => {
    const decision = planner.plan({ validation: validation({ bias: 0.03 }) });
    expect(decision.fullPlan.detectedBiases).toEqual([]);
    expect(decision.automatedSteps).toEqual([]);
    expect(decision.requiresManual).toBe(0);
  });

  it("deduplicates categories across bias types and counts manual steps", () => {
    const decision = planner.plan({ validation: validation({ totalReturn: 0.08, trades: 4, chronological: true }) });
    expect(decision.fullPlan.detectedBiases).toEqual(["curve_fitting", "chronological_violation"]);
    expect(decision.automatedSteps).toEqual(["parameter_reduction", "out_of_sample_enforcement"]);
    expect(decision.requiresManual).toBe(5);
  });

  it("builds a summary naming the counts", () => {
    const decision = planner.plan({ validation: validation({ bias: 0.2 }) });
    expect(decision.fullPlan.summary).toContain("Detected Biases: 1");
    expect(decision.fullPlan.summary).toContain("Recommended Actions: 4");
    expect(decision.fullPlan.summary).toContain(
      "  1. Implement walk-forward optimization instead of single-period optimization",
    );
  });
});

describe("loadPlaybook", () => {
  it("covers every bias type with four steps", () => {
    const playbook = loadPlaybook();
    for (const entry of Object.values(playbook)) {
      expect(entry.steps).toHaveLength(4);
    }
  });
});
