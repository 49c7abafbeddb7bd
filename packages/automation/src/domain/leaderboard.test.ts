import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteStore } from "@stratfix/lineage";
import { fallbackScore, promoteResult } from "./leaderboard.js";

describe("promoteResult", () => {
  let store: SqliteStore;
  let strategyId: number;

  function successfulRun(score: number | null, sharpe = 1.2): { variantId: number; runId: number } {
    const variantId = store.createVariant({ strategyId, config: { sharpe } });
    const runId = store.openRun({ variantId, dataSource: "bars.txt", iteration: 0 });
    store.closeRun(runId, { status: "success" });
    store.recordMetrics(runId, {
      metrics: { sharpe_ratio: sharpe, max_drawdown: -0.25, total_trades: 20 },
      biasSelection: 0.125,
      score,
    });
    return { variantId, runId };
  }

  beforeEach(() => {
    store = new SqliteStore();
    strategyId = store.upsertStrategy({ family: "sma", name: "sma_cross" });
  });

  afterEach(() => {
    store.close();
  });

  it("uses the recorded score and the next rank", () => {
    const first = promoteResult(store, successfulRun(1.5));
    const second = promoteResult(store, successfulRun(0.5));

    expect(first).toMatchObject({ score: 1.5, rank: 1 });
    expect(second).toMatchObject({ score: 0.5, rank: 2 });
  });

  it("falls back to sharpe less drawdown and bias when no score was stored", () => {
    const result = promoteResult(store, successfulRun(null, 1.5));
    expect(result.score).toBe(1.125);
  });

  it("replaces an existing entry for the same variant", () => {
    const run = successfulRun(1);
    const first = promoteResult(store, run);
    const again = promoteResult(store, run);

    expect(again.leaderboardId).toBe(first.leaderboardId);
    expect(store.getLeaderboardEntry(run.variantId)).toMatchObject({ rank: 2, status: "candidate" });
  });
});

describe("fallbackScore", () => {
  it("treats missing metrics as zero", () => {
    expect(fallbackScore({ sharpe_ratio: null, max_drawdown: null, bias_selection: null })).toBe(0);
  });
});
