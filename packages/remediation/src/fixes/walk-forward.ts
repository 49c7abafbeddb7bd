import { cloneConfig, metadataSection, numericParam, type StrategyType } from "../config/strategy-config.js";
import { writeVariantSource } from "./files.js";
import type { FixHandler } from "./types.js";

const SCHEDULES: Record<StrategyType, { windows: number; step: string }> = {
  sma: { windows: 4, step: "monthly" },
  rsi: { windows: 6, step: "bi-monthly" },
  macd: { windows: 5, step: "quarterly" },
};

/** Shortens lookbacks (or lengthens, for RSI) and records a rolling-window schedule. */
export const walkForward: FixHandler = (config, ctx) => {
  const next = cloneConfig(config);
  const p = next.parameters;

  switch (next.strategy_type) {
    case "sma": {
      const short = Math.max(2, Math.trunc(numericParam(config, "short") * 0.9));
      p.short = short;
      p.long = Math.max(short + 5, Math.trunc(numericParam(config, "long") * 0.92));
      break;
    }
    case "rsi":
      p.period = Math.min(40, Math.max(5, Math.trunc(numericParam(config, "period") * 1.1)));
      p.overbought = Math.max(60, numericParam(config, "overbought") - 2);
      p.oversold = Math.min(40, numericParam(config, "oversold") + 2);
      break;
    case "macd": {
      const fast = Math.max(6, Math.trunc(numericParam(config, "fast") * 0.95));
      p.fast = fast;
      p.slow = Math.max(fast + 5, Math.trunc(numericParam(config, "slow") * 1.05));
      p.signal = Math.max(3, Math.trunc(numericParam(config, "signal") * 0.9));
      break;
    }
  }

  next.metadata.walk_forward = { ...metadataSection(config, "walk_forward"), ...SCHEDULES[next.strategy_type] };
  return writeVariantSource(next, ctx, "walk_forward", "// Automated walk-forward adjustments applied\n");
};
