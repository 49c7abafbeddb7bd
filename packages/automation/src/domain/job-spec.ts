import { z } from "zod";
import { GENERATION_POLICIES, StrategySpecSchema, type GenerationPolicy, type StrategySpec } from "@stratfix/remediation";
import { describeZodError } from "@stratfix/kit";

export const JOB_TYPES = ["strategy_batch"] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const StrategyBatchSpecSchema = z.object({
  specs: z.array(StrategySpecSchema).min(1),
  data_path: z.string().min(1),
  max_iterations: z.number().int().nonnegative().optional(),
  policy: z.enum(GENERATION_POLICIES).default("grid"),
});

export interface StrategyBatchJob {
  type: "strategy_batch";
  specs: StrategySpec[];
  dataPath: string;
  /** Unset means the worker's configured `remediation.maxIterations`. */
  maxIterations?: number;
  policy: GenerationPolicy;
}

/** A decoded job specification, discriminated by `type`. */
export type JobSpec = StrategyBatchJob;

export class UnsupportedJobType extends Error {
  readonly jobType: string;

  constructor(jobType: string) {
    super(`Unsupported job type: ${jobType}`);
    this.name = "UnsupportedJobType";
    this.jobType = jobType;
  }
}

/**
 * Decodes a queued job's specification, applying defaults.
 *
 * @throws {UnsupportedJobType} for any job type other than `strategy_batch`
 * @throws {Error} when the specification does not match the job type's schema
 */
export function parseJobSpec(jobType: string, specification: unknown): JobSpec {
  if (jobType !== "strategy_batch") {
    throw new UnsupportedJobType(jobType);
  }
  const parsed = StrategyBatchSpecSchema.safeParse(specification);
  if (!parsed.success) {
    throw new Error(describeZodError(`${jobType} specification`, parsed.error));
  }
  const { specs, data_path, max_iterations, policy } = parsed.data;
  return { type: "strategy_batch", specs, dataPath: data_path, maxIterations: max_iterations, policy };
}

/** Job file accepted by `stratfix enqueue`. */
export const JobFileSchema = z.object({
  job_type: z.string().default("strategy_batch"),
  priority: z.number().int().default(0),
  max_retries: z.number().int().nonnegative().default(3),
  specification: z.unknown(),
});

export type JobFile = z.output<typeof JobFileSchema>;
