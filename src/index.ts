export type * from "./types/chain.js";
export type * from "./types/events.js";
export type * from "./types/operations.js";

export { ChainExecutor, type ExecutorDeps, type ExecuteOptions, type ExecutorStatus } from "./orchestrator/executor.js";
export { runChain, type RunOptions } from "./orchestrator/run.js";
export { compileChain, stepId, type CompiledChain, type CompileOptions } from "./orchestrator/compiler.js";
export { chainDefinitionSchema, stepDefinitionSchema } from "./orchestrator/schema.js";
export { ChainConfigError } from "./orchestrator/errors.js";
export { resolveInputs, referencedKey, type ResolvedInputs } from "./orchestrator/resolve.js";
export { invokeOperation, type Outcome } from "./orchestrator/invoke.js";
export { evaluatePolicy, mapOutputs, type PolicyDecision } from "./orchestrator/policy.js";
export { chainStatus, tally } from "./orchestrator/result.js";
export { buildOperationRegistry, lookupOperation } from "./operations/registry.js";
export { createChainState, read, write, exists, keys, history, snapshot, type ChainState, type StateVersion } from "./state/index.js";
export { createConsoleSink, createMemorySink, combineSinks, formatEvent } from "./events/sinks.js";
export { loadEngineConfig, DEFAULT_MAX_TRANSITIONS, type EngineConfig } from "./config.js";
