import { z } from "zod";
import type { StrategyConfig } from "../config/strategy-config.js";

export const PerformanceMetricsSchema = z.object({
  sharpe_ratio: z.number(),
  total_return: z.number(),
  max_drawdown: z.number(),
  total_trades: z.number().int().nonnegative(),
  win_rate: z.number().nullable(),
});

export const ValidationResultSchema = z.object({
  performance_metrics: PerformanceMetricsSchema,
  algorithm_results: z.record(z.string(), z.unknown()).default({}),
  chronological_violations: z.boolean().optional(),
  raw_output: z.string().optional(),
});

export type PerformanceMetrics = z.output<typeof PerformanceMetricsSchema>;
export type ValidationResult = z.output<typeof ValidationResultSchema>;

export interface ValidateOptions {
  /** Aborted when the caller's timeout elapses. */
  signal: AbortSignal;
}

/** Runs one strategy configuration against a data source and reports metrics and bias indicators. */
export interface Validator {
  validate(config: StrategyConfig, dataPath: string, opts: ValidateOptions): Promise<ValidationResult>;
}
