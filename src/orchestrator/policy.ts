import type { FailurePolicy, StepDefinition, StepId } from "../types/chain.js";
import type { CompiledChain } from "./compiler.js";
import type { Outcome } from "./invoke.js";

export type StateWrite = [key: string, value: unknown];

export type PolicyDecision =
  | { kind: "advance"; writes: StateWrite[]; next: number; bypassed: boolean }
  | { kind: "retry" }
  | { kind: "stop"; reason: string }
  | { kind: "cancel" };

const DEFAULT_FAILURE: FailurePolicy = { action: "stop" };

function target(chain: CompiledChain, next: StepId | undefined, position: number): PolicyDecision | number {
  if (next === undefined) return position + 1;
  const idx = chain.index.get(next);
  if (idx === undefined) return { kind: "stop", reason: `config: unknown step '${next}'` };
  return idx;
}

function advance(chain: CompiledChain, next: StepId | undefined, position: number, writes: StateWrite[], bypassed: boolean): PolicyDecision {
  const to = target(chain, next, position);
  if (typeof to !== "number") return to;
  return { kind: "advance", writes, next: to, bypassed };
}

export function mapOutputs(output: Record<string, unknown>, mappings: Record<string, string> = {}): StateWrite[] {
  const writes: StateWrite[] = [];
  for (const [field, key] of Object.entries(mappings)) {
    if (Object.hasOwn(output, field)) writes.push([key, output[field]]);
  }
  return writes;
}

/**
 * Decides what follows one attempt of the step at `position`.
 * `attempt` is 1-based within the current visit.
 */
export function evaluatePolicy(
  outcome: Outcome,
  step: StepDefinition,
  attempt: number,
  position: number,
  chain: CompiledChain
): PolicyDecision {
  if (outcome.ok) {
    const writes = mapOutputs(outcome.output, step.on_success?.output_mappings);
    return advance(chain, step.on_success?.next, position, writes, false);
  }

  const { error } = outcome;
  if (error.kind === "cancelled") return { kind: "cancel" };
  // a missing operation is not retryable, whatever the step declares
  if (error.kind === "config") return { kind: "stop", reason: `config: ${error.message}` };

  const policy = step.on_failure ?? DEFAULT_FAILURE;
  switch (policy.action) {
    case "stop":
      return { kind: "stop", reason: error.message };
    case "continue":
      return advance(chain, policy.next, position, [], true);
    case "retry": {
      const max = policy.max_retries ?? 1;
      if (attempt < max) return { kind: "retry" };
      if (policy.continue_on_max_retries) return advance(chain, policy.next, position, [], true);
      return { kind: "stop", reason: `retries exhausted after ${attempt} attempts: ${error.message}` };
    }
  }
}
