import { z } from "zod";

export const STRATEGY_TYPES = ["sma", "rsi", "macd"] as const;
export type StrategyType = (typeof STRATEGY_TYPES)[number];

export const ParamValueSchema = z.union([z.number(), z.string(), z.boolean()]);
export type ParamValue = z.infer<typeof ParamValueSchema>;

export const StrategyConfigSchema = z.object({
  name: z.string().min(1),
  strategy_type: z.enum(STRATEGY_TYPES),
  parameters: z.record(z.string(), ParamValueSchema),
  metadata: z.record(z.string(), z.unknown()).default({}),
  source: z.string().nullable().default(null),
});

/** One concrete, fully specified strategy configuration. */
export type StrategyConfig = z.output<typeof StrategyConfigSchema>;

export const DEFAULT_PARAMS: Record<StrategyType, Record<string, ParamValue>> = {
  sma: { short: 10, long: 40, fee: 0.0005, symbol: "DEMO" },
  rsi: { period: 14, overbought: 70, oversold: 30, confirm: 2, fee: 0.0005, symbol: "DEMO" },
  macd: { fast: 12, slow: 26, signal: 9, overbought: 1.0, oversold: -1.0, fee: 0.0005, symbol: "DEMO" },
};

/** Runner flag order per strategy type. */
const PARAM_ORDER: Record<StrategyType, ReadonlyArray<readonly [string, string]>> = {
  sma: [["short", "--short"], ["long", "--long"], ["fee", "--fee"], ["symbol", "--symbol"]],
  rsi: [
    ["period", "--period"],
    ["overbought", "--overbought"],
    ["oversold", "--oversold"],
    ["confirm", "--confirm"],
    ["fee", "--fee"],
    ["symbol", "--symbol"],
  ],
  macd: [
    ["fast", "--fast"],
    ["slow", "--slow"],
    ["signal", "--signal"],
    ["overbought", "--overbought"],
    ["oversold", "--oversold"],
    ["fee", "--fee"],
    ["symbol", "--symbol"],
  ],
};

function formatParam(value: ParamValue): string {
  if (typeof value === "number" && !Number.isInteger(value)) {
    return value.toFixed(6).replace(/0+$/, "").replace(/\.$/, "");
  }
  return String(value);
}

/** Arguments for the strategy runner: `<type> <data> --flag value ...`. */
export function cliArgs(config: StrategyConfig, dataPath: string): string[] {
  const args = [config.strategy_type, dataPath];
  for (const [key, flag] of PARAM_ORDER[config.strategy_type]) {
    const value = config.parameters[key];
    if (value === undefined) continue;
    args.push(flag, formatParam(value));
  }
  return args;
}

/** Numeric parameter, falling back to the type default when absent or non-numeric. */
export function numericParam(config: StrategyConfig, key: string): number {
  const value = config.parameters[key];
  if (typeof value === "number") return value;
  const fallback = DEFAULT_PARAMS[config.strategy_type][key];
  return typeof fallback === "number" ? fallback : 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested metadata object under `key`, or an empty one. */
export function metadataSection(config: StrategyConfig, key: string): Record<string, unknown> {
  const section = config.metadata[key];
  return isRecord(section) ? section : {};
}

export function cloneConfig(config: StrategyConfig): StrategyConfig {
  return structuredClone(config);
}
