import type { FixKind } from "../planner/types.js";
import type { PerformanceMetrics } from "../validator/types.js";

export interface SummaryIteration {
  iteration: number;
  biasMagnitude: number;
  metrics: PerformanceMetrics;
  appliedFixes: FixKind[];
}

function formatDuration(durationMs: number): string {
  const min = Math.floor(durationMs / 60000);
  const sec = Math.floor((durationMs % 60000) / 1000);
  return min > 0 ? `${min}m ${sec}s` : `${sec}s`;
}

/** Plain-text session report, one line per validated iteration. */
export function buildSessionSummary(opts: {
  strategy: string;
  state: "converged" | "exhausted";
  success: boolean;
  initialBias: number;
  finalBias: number;
  iterations: SummaryIteration[];
  durationMs: number;
  planSummary?: string;
}): string {
  const { strategy, state, success, initialBias, finalBias, iterations, durationMs, planSummary } = opts;

  const lines: string[] = [];
  lines.push(`Remediation session: ${strategy}`);
  lines.push(`State: ${state.toUpperCase()}`);
  lines.push(`Success: ${success ? "yes" : "no"}`);
  lines.push(`Iterations: ${Math.max(0, iterations.length - 1)}`);
  lines.push(`Duration: ${formatDuration(durationMs)}`);
  lines.push(`Selection bias: ${initialBias.toFixed(4)} -> ${finalBias.toFixed(4)}`);

  if (iterations.length > 0) {
    lines.push("");
    lines.push("Evolution:");
    for (const it of iterations) {
      const m = it.metrics;
      const fixes = it.appliedFixes.length > 0 ? ` fixes=${it.appliedFixes.join(",")}` : "";
      lines.push(
        `  iter${it.iteration}: bias=${it.biasMagnitude.toFixed(4)} sharpe=${m.sharpe_ratio.toFixed(2)} ` +
          `return=${(m.total_return * 100).toFixed(2)}% dd=${(m.max_drawdown * 100).toFixed(2)}% trades=${m.total_trades}${fixes}`,
      );
    }
  }

  if (planSummary) {
    lines.push("");
    lines.push(planSummary);
  }

  return lines.join("\n");
}
