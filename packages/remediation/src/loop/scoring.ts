import type { PerformanceMetrics } from "../validator/types.js";

export interface Improvement {
  sharpeImprovement: number;
  biasReduction: number;
  /** 1 when the trade count moved by at most three, else 0. */
  tradeConsistency: 0 | 1;
}

/** Leaderboard score: Sharpe ratio less drawdown and selection bias penalties. */
export function computeScore(metrics: Pick<PerformanceMetrics, "sharpe_ratio" | "max_drawdown">, bias: number): number {
  return metrics.sharpe_ratio - Math.abs(metrics.max_drawdown) - Math.abs(bias);
}

export function computeImprovement(
  before: { metrics: PerformanceMetrics; bias: number },
  after: { metrics: PerformanceMetrics; bias: number },
): Improvement {
  const tradeDelta = Math.abs(after.metrics.total_trades - before.metrics.total_trades);
  return {
    sharpeImprovement: after.metrics.sharpe_ratio - before.metrics.sharpe_ratio,
    biasReduction: before.bias - after.bias,
    tradeConsistency: tradeDelta <= 3 ? 1 : 0,
  };
}

/**
 * Converged below the floor, or cut the initial bias by the configured ratio.
 * Compares magnitudes, the same rule the loop's floor check uses.
 */
export function isSuccessful(initialBias: number, finalBias: number, opts: { biasFloor: number; successRatio: number }): boolean {
  const final = Math.abs(finalBias);
  return final < opts.biasFloor || final < opts.successRatio * Math.abs(initialBias);
}
