import { z } from "zod";
import type { ValidationResult } from "../validator/types.js";

const SELECTION_BIAS = /Selection bias=(\S+)/;

const SelbiasSchema = z.object({
  SELBIAS: z.object({
    bias_metrics: z.object({ detected_bias: z.string() }),
  }),
});

/** Reads the signed float after `Selection bias=`; 0 when absent or not a number. */
export function parseBiasMagnitude(line: string): number {
  const match = SELECTION_BIAS.exec(line);
  if (!match?.[1]) return 0;
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : 0;
}

/** Bias magnitude reported under `algorithm_results.SELBIAS.bias_metrics.detected_bias`. */
export function extractBiasMagnitude(validation: ValidationResult): number {
  const parsed = SelbiasSchema.safeParse(validation.algorithm_results);
  return parsed.success ? parseBiasMagnitude(parsed.data.SELBIAS.bias_metrics.detected_bias) : 0;
}
