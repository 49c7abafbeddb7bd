import { describe, it, expect } from "vitest";
import { buildSessionSummary } from "./summary.js";

describe("buildSessionSummary", () => {
  it("lists every iteration with its fixes", () => {
    const text = buildSessionSummary({
      strategy: "sma_demo",
      state: "converged",
      success: true,
      initialBias: 0.2,
      finalBias: 0.04,
      durationMs: 65_000,
      iterations: [
        {
          iteration: 0,
          biasMagnitude: 0.2,
          metrics: { sharpe_ratio: 1.2, total_return: 0.15, max_drawdown: -0.1, total_trades: 40, win_rate: 0.55 },
          appliedFixes: [],
        },
        {
          iteration: 1,
          biasMagnitude: 0.04,
          metrics: { sharpe_ratio: 1, total_return: 0.125, max_drawdown: -0.05, total_trades: 38, win_rate: 0.5 },
          appliedFixes: ["walk_forward", "parameter_reduction"],
        },
      ],
    });

    expect(text.split("\n")).toEqual([
      "Remediation session: sma_demo",
      "State: CONVERGED",
      "Success: yes",
      "Iterations: 1",
      "Duration: 1m 5s",
      "Selection bias: 0.2000 -> 0.0400",
      "",
      "Evolution:",
      "  iter0: bias=0.2000 sharpe=1.20 return=15.00% dd=-10.00% trades=40",
      "  iter1: bias=0.0400 sharpe=1.00 return=12.50% dd=-5.00% trades=38 fixes=walk_forward,parameter_reduction",
    ]);
  });

  it("appends the plan summary and shows seconds only under a minute", () => {
    const text = buildSessionSummary({
      strategy: "rsi_demo",
      state: "exhausted",
      success: false,
      initialBias: 0.3,
      finalBias: 0.2,
      durationMs: 4_500,
      iterations: [],
      planSummary: "Bias Remediation Summary",
    });

    expect(text.split("\n")).toEqual([
      "Remediation session: rsi_demo",
      "State: EXHAUSTED",
      "Success: no",
      "Iterations: 0",
      "Duration: 4s",
      "Selection bias: 0.3000 -> 0.2000",
      "",
      "Bias Remediation Summary",
    ]);
  });
});
