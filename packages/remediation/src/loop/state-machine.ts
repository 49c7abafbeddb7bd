/**
 * xstate v5 machine for one remediation session.
 *
 * The session runner performs the I/O (validate, persist, fix) and reports
 * outcomes as events; the machine owns the iteration counter and decides
 * when the session has converged, run out of budget, or failed.
 */

import { setup, assign } from "xstate";

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------
interface RemediationContext {
  /** Completed remediation iterations. */
  iteration: number;
  maxIterations: number;
  biasFloor: number;
  initialBias: number;
  currentBias: number;
  error: string | undefined;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export type RemediationEvent =
  | { type: "BASELINE_OK"; bias: number }
  | { type: "BASELINE_FAILED"; error: string }
  | { type: "PLAN_EMPTY" }
  | { type: "ITERATION_OK"; bias: number }
  | { type: "ITERATION_FAILED"; error: string };

export interface RemediationInput {
  maxIterations: number;
  biasFloor?: number;
}

export type RemediationStateValue = "baseline" | "iterating" | "converged" | "exhausted" | "failed";

export const remediationMachine = setup({
  types: {
    context: {} as RemediationContext,
    events: {} as RemediationEvent,
    input: {} as RemediationInput,
  },
  guards: {
    noIterationBudget: ({ context }) => context.maxIterations <= 0,

    belowFloor: ({ context, event }) =>
      event.type === "ITERATION_OK" && Math.abs(event.bias) < context.biasFloor,

    budgetSpent: ({ context }) => context.iteration + 1 >= context.maxIterations,
  },
  actions: {
    recordBaseline: assign({
      initialBias: ({ event }) => (event.type === "BASELINE_OK" ? event.bias : 0),
      currentBias: ({ event }) => (event.type === "BASELINE_OK" ? event.bias : 0),
    }),
    recordIteration: assign({
      iteration: ({ context }) => context.iteration + 1,
      currentBias: ({ context, event }) => (event.type === "ITERATION_OK" ? event.bias : context.currentBias),
    }),
    recordError: assign({
      error: ({ event }) => {
        if (event.type === "BASELINE_FAILED" || event.type === "ITERATION_FAILED") return event.error;
        return undefined;
      },
    }),
  },
}).createMachine({
  id: "remediation",
  context: ({ input }) => ({
    iteration: 0,
    maxIterations: input.maxIterations,
    biasFloor: input.biasFloor ?? 0.05,
    initialBias: 0,
    currentBias: 0,
    error: undefined,
  }),
  initial: "baseline",
  states: {
    baseline: {
      on: {
        BASELINE_OK: [
          { target: "exhausted", guard: "noIterationBudget", actions: "recordBaseline" },
          { target: "iterating", actions: "recordBaseline" },
        ],
        BASELINE_FAILED: { target: "failed", actions: "recordError" },
      },
    },

    iterating: {
      on: {
        PLAN_EMPTY: { target: "converged" },
        ITERATION_OK: [
          { target: "converged", guard: "belowFloor", actions: "recordIteration" },
          { target: "exhausted", guard: "budgetSpent", actions: "recordIteration" },
          { target: "iterating", actions: "recordIteration" },
        ],
        ITERATION_FAILED: { target: "failed", actions: "recordError" },
      },
    },

    converged: { type: "final" },
    exhausted: { type: "final" },
    failed: { type: "final" },
  },
});
