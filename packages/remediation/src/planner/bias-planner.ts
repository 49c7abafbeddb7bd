import fs from "node:fs";
import { z } from "zod";
import { safeJsonParse } from "@stratfix/kit";
import { extractBiasMagnitude } from "../loop/bias.js";
import type { ValidationResult } from "../validator/types.js";
import {
  BIAS_TYPES,
  FIX_KINDS,
  type BiasType,
  type FixKind,
  type PlanDecision,
  type RemediationPlan,
  type RemediationPlanner,
} from "./types.js";

const PlaybookEntrySchema = z.object({
  steps: z.array(z.object({ text: z.string(), fix: z.enum(FIX_KINDS).optional() })),
  improvements: z.array(z.string()),
  validations: z.array(z.string()),
});

const PlaybookSchema = z.object({
  selection_bias: PlaybookEntrySchema,
  data_snooping: PlaybookEntrySchema,
  curve_fitting: PlaybookEntrySchema,
  chronological_violation: PlaybookEntrySchema,
});

export type Playbook = z.output<typeof PlaybookSchema>;

export function loadPlaybook(file: URL | string = new URL("./playbook.json", import.meta.url)): Playbook {
  return safeJsonParse(fs.readFileSync(file, "utf8"), { schema: PlaybookSchema });
}

/**
 * p-value style ratio over per-trade returns: the share of trades that were
 * not clear wins. Null when there are too few trades to judge.
 */
function snoopingPValue(returns: number[]): number | null {
  if (returns.length <= 20) return null;
  const wins = returns.filter((r) => r > 0.001).length;
  const trades = returns.filter((r) => Math.abs(r) > 0.0005).length;
  if (trades <= 5) return null;
  return 1 - wins / trades;
}

export function identifyBiasTypes(validation: ValidationResult, selectionBiasThreshold: number): BiasType[] {
  const found = new Set<BiasType>();
  const { total_return: totalReturn, total_trades: totalTrades } = validation.performance_metrics;

  if (Math.abs(extractBiasMagnitude(validation)) > selectionBiasThreshold) {
    found.add("selection_bias");
  }

  // Only aggregate metrics are available, so spread the return evenly across trades.
  if (totalTrades > 0) {
    const n = Math.max(1, totalTrades);
    const pValue = snoopingPValue(new Array<number>(n).fill(totalReturn / n));
    if (pValue !== null && pValue < 0.1) found.add("data_snooping");
  }

  if (Math.abs(totalReturn) > 0.05 && totalTrades < 10) {
    found.add("curve_fitting");
  }

  if (validation.chronological_violations) {
    found.add("chronological_violation");
  }

  return BIAS_TYPES.filter((t) => found.has(t));
}

function buildSummary(plan: Omit<RemediationPlan, "summary">): string {
  return [
    "Bias Remediation Summary",
    "========================",
    "",
    `Detected Biases: ${plan.detectedBiases.length}`,
    `Recommended Actions: ${plan.remediationSteps.length}`,
    "",
    "Priority Actions:",
    ...plan.remediationSteps.slice(0, 3).map((s, i) => `  ${i + 1}. ${s}`),
  ].join("\n");
}

/**
 * Maps detected bias types to a playbook of remediation steps. Steps tagged
 * with a FixKind can be automated; the rest are counted as manual work.
 */
export class BiasPlanner implements RemediationPlanner {
  private playbook: Playbook;
  private selectionBiasThreshold: number;

  constructor(opts: { selectionBiasThreshold?: number; playbook?: Playbook } = {}) {
    this.playbook = opts.playbook ?? loadPlaybook();
    this.selectionBiasThreshold = opts.selectionBiasThreshold ?? 0.08;
  }

  plan(input: { validation: ValidationResult }): PlanDecision {
    const detectedBiases = identifyBiasTypes(input.validation, this.selectionBiasThreshold);
    const steps = detectedBiases.flatMap((b) => this.playbook[b].steps);

    const base = {
      detectedBiases,
      remediationSteps: steps.map((s) => s.text),
      suggestedImprovements: detectedBiases.flatMap((b) => this.playbook[b].improvements),
      validationRecommendations: detectedBiases.flatMap((b) => this.playbook[b].validations),
    };
    const tagged = new Set<FixKind>();
    for (const s of steps) {
      if (s.fix) tagged.add(s.fix);
    }

    return {
      fullPlan: { ...base, summary: buildSummary(base) },
      automatedSteps: FIX_KINDS.filter((k) => tagged.has(k)),
      requiresManual: steps.filter((s) => !s.fix).length,
    };
  }
}
