import { describe, it, expect } from "vitest";
import { parseBiasMagnitude, extractBiasMagnitude } from "./bias.js";
import type { ValidationResult } from "../validator/types.js";

function validation(algorithmResults: Record<string, unknown>): ValidationResult {
  return {
    performance_metrics: { sharpe_ratio: 1, total_return: 0.02, max_drawdown: -0.05, total_trades: 10, win_rate: 0.5 },
    algorithm_results: algorithmResults,
  };
}

describe("parseBiasMagnitude", () => {
  it("reads the selection bias value", () => {
    expect(parseBiasMagnitude("OOS=0.03 Selection bias=0.1233 t=2.24")).toBe(0.1233);
  });

  it("keeps the sign of a negative value", () => {
    expect(parseBiasMagnitude("OOS=0.03 Selection bias=-0.1200 t=2.24")).toBe(-0.12);
  });

  it("reads exponent notation", () => {
    expect(parseBiasMagnitude("Selection bias=1e-05 t=0.1")).toBe(0.00001);
    expect(parseBiasMagnitude("Selection bias=2.5E-3")).toBe(0.0025);
  });

  it("returns 0 when the marker is absent", () => {
    expect(parseBiasMagnitude("OOS=0.03 t=2.24")).toBe(0);
    expect(parseBiasMagnitude("")).toBe(0);
  });

  it("returns 0 when no number follows the marker", () => {
    expect(parseBiasMagnitude("Selection bias=n/a")).toBe(0);
  });
});

describe("extractBiasMagnitude", () => {
  it("follows the SELBIAS path", () => {
    const v = validation({ SELBIAS: { bias_metrics: { detected_bias: "OOS=0.0100  Selection bias=0.0900  t=1.500" } } });
    expect(extractBiasMagnitude(v)).toBe(0.09);
  });

  it("returns 0 when the path is missing or malformed", () => {
    expect(extractBiasMagnitude(validation({}))).toBe(0);
    expect(extractBiasMagnitude(validation({ SELBIAS: { error: "no data" } }))).toBe(0);
    expect(extractBiasMagnitude(validation({ SELBIAS: { bias_metrics: { detected_bias: 0.2 } } }))).toBe(0);
  });
});
