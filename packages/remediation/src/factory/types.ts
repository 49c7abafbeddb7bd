import { z } from "zod";
import { ParamValueSchema, STRATEGY_TYPES } from "../config/strategy-config.js";

export const GENERATION_POLICIES = ["grid", "random"] as const;
export type GenerationPolicy = (typeof GENERATION_POLICIES)[number];

/** A template plus a parameter grid, expanded into concrete configs by the factory. */
export const StrategySpecSchema = z.object({
  base_name: z.string().min(1),
  strategy_type: z.enum(STRATEGY_TYPES),
  template_path: z.string().min(1),
  base_parameters: z.record(z.string(), ParamValueSchema).default({}),
  parameter_grid: z.record(z.string(), z.array(ParamValueSchema).min(1)).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
  limit: z.number().int().positive().nullable().default(null),
});

export type StrategySpec = z.output<typeof StrategySpecSchema>;
export type StrategySpecInput = z.input<typeof StrategySpecSchema>;
