import type { StrategyConfig } from "../config/strategy-config.js";

export interface FixContext {
  dataPath: string;
  /** Directory receiving generated sources, splits and parameter files. */
  outputsDir: string;
  /** Remediation iteration producing the variant; keeps each variant's source copy distinct. */
  iteration: number;
}

/** A remediation transform. Never mutates its input config. */
export type FixHandler = (config: StrategyConfig, ctx: FixContext) => StrategyConfig;
