import type { RunMetricsRow, SqliteStore } from "@stratfix/lineage";

/** Score for a metrics row that was stored without one. */
export function fallbackScore(metrics: Pick<RunMetricsRow, "sharpe_ratio" | "max_drawdown" | "bias_selection">): number {
  return (metrics.sharpe_ratio ?? 0) - Math.abs(metrics.max_drawdown ?? 0) - Math.abs(metrics.bias_selection ?? 0);
}

/**
 * Enters a variant's successful run on the leaderboard as a candidate,
 * replacing any earlier entry for the same variant.
 */
export function promoteResult(
  store: SqliteStore,
  input: { variantId: number; runId: number },
): { leaderboardId: number; score: number; rank: number } {
  const metrics = store.getRunMetrics(input.runId);
  const score = metrics ? (metrics.score ?? fallbackScore(metrics)) : 0;
  const rank = store.nextLeaderboardRank();
  const leaderboardId = store.upsertLeaderboardEntry({
    variantId: input.variantId,
    bestRunId: input.runId,
    score,
    rank,
    status: "candidate",
  });
  return { leaderboardId, score, rank };
}
