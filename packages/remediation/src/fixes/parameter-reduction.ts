import { cloneConfig, numericParam } from "../config/strategy-config.js";
import { emitBatchParameters, writeVariantSource } from "./files.js";
import type { FixHandler } from "./types.js";

/** Clamps the searchable parameters into fixed bounds. */
export const parameterReduction: FixHandler = (config, ctx) => {
  const next = cloneConfig(config);
  const p = next.parameters;

  switch (next.strategy_type) {
    case "sma": {
      const short = Math.max(3, Math.min(numericParam(config, "short"), 15));
      p.short = short;
      p.long = Math.max(short + 5, Math.min(numericParam(config, "long"), 60));
      next.metadata.parameter_bounds = { short: [3, 20], long: [25, 80] };
      break;
    }
    case "rsi":
      p.overbought = Math.min(75, numericParam(config, "overbought"));
      p.oversold = Math.max(25, numericParam(config, "oversold"));
      next.metadata.parameter_bounds = { overbought: [65, 80], oversold: [20, 35] };
      break;
    case "macd": {
      const fast = Math.max(8, Math.min(numericParam(config, "fast"), 15));
      p.fast = fast;
      p.slow = Math.max(fast + 5, Math.min(numericParam(config, "slow"), 40));
      next.metadata.parameter_bounds = { fast: [8, 15], slow: [18, 45] };
      break;
    }
  }

  const written = writeVariantSource(next, ctx, "parameter_reduced", "// Parameter bounds tightened for robustness\n");
  return emitBatchParameters(written, ctx.outputsDir);
};
