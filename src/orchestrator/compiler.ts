import type { ChainDefinition, ExecutionMode, StepDefinition, StepId } from "../types/chain.js";
import type { OperationRegistry } from "../types/operations.js";
import { lookupOperation } from "../operations/registry.js";
import { chainDefinitionSchema, formatIssues } from "./schema.js";
import { ChainConfigError } from "./errors.js";

export interface CompiledChain {
  definition: ChainDefinition;
  ids: StepId[];
  index: Map<StepId, number>;
}

export interface CompileOptions<C = unknown> {
  /** When given, every operation must exist and be enabled. */
  registry?: OperationRegistry<C>;
  mode?: ExecutionMode;
}

/** Unnamed steps are labelled `#<position>`. Step names never start with `#`. */
export function stepId(step: StepDefinition, position: number): StepId {
  return step.step_name ?? `#${position}`;
}

export function compileChain<C = unknown>(draft: unknown, opts: CompileOptions<C> = {}): CompiledChain {
  const parsed = chainDefinitionSchema.safeParse(draft);
  if (!parsed.success) {
    throw new ChainConfigError("Invalid chain definition", formatIssues(parsed.error));
  }
  const definition: ChainDefinition = parsed.data;
  const issues: string[] = [];

  const ids = definition.steps.map(stepId);
  // jump targets are author-given names only
  const index = new Map<StepId, number>();
  definition.steps.forEach((step, i) => {
    if (step.step_name === undefined) return;
    if (index.has(step.step_name)) issues.push(`steps.${i}: duplicate step name '${step.step_name}'`);
    else index.set(step.step_name, i);
  });

  definition.steps.forEach((step, i) => {
    const targets: Array<[string, string | undefined]> = [
      ["on_success.next", step.on_success?.next],
      ["on_failure.next", step.on_failure?.next]
    ];
    for (const [field, target] of targets) {
      if (target === undefined) continue;
      if (opts.mode === "parallel") {
        issues.push(`steps.${i}.${field}: branching is not supported in parallel mode`);
      } else if (!index.has(target)) {
        issues.push(`steps.${i}.${field}: unknown step '${target}'`);
      }
    }
    if (opts.registry && !lookupOperation(opts.registry, step.operation)) {
      issues.push(`steps.${i}.operation: operation '${step.operation}' is not registered or is disabled`);
    }
  });

  if (issues.length) {
    throw new ChainConfigError(`Chain '${definition.chain_name ?? "unnamed"}' is not runnable`, issues);
  }
  return { definition, ids, index };
}
