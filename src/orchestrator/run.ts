// src/orchestrator/run.ts
// Drives one chain run: resolve -> invoke -> evaluate per attempt, then either
// a cursor loop (sequential) or a fan-out joined in definition order (parallel).

import { randomUUID } from "node:crypto";
import type { ChainResult, ExecutionMode, StepId, StepResult } from "../types/chain.js";
import type { ChainEvent, EventSink } from "../types/events.js";
import type { OperationRegistry } from "../types/operations.js";
import type { CompiledChain } from "./compiler.js";
import type { Outcome } from "./invoke.js";
import type { PolicyDecision, StateWrite } from "./policy.js";
import { createChainState, metaSnapshot, snapshot, write, writeMeta, type ChainState } from "../state/index.js";
import { resolveInputs } from "./resolve.js";
import { invokeOperation } from "./invoke.js";
import { evaluatePolicy } from "./policy.js";
import { chainStatus, tally, type Visit } from "./result.js";
import { DEFAULT_MAX_TRANSITIONS } from "../config.js";

export interface RunOptions<C = unknown> {
  chain: CompiledChain;
  registry: OperationRegistry<C>;
  context: C;
  initialState?: Record<string, unknown>;
  mode?: ExecutionMode;
  chainName?: string;
  chainId?: string;
  sink?: EventSink;
  signal?: AbortSignal;
  /** Upper bound on step visits in sequential mode. */
  maxTransitions?: number;
}

interface AttemptRecord {
  position: number;
  attempt: number;
  started_at: string;
  duration_ms: number;
  outcome: Outcome;
  decision: PolicyDecision;
  unresolved: string[];
}

interface VisitResult {
  attempts: AttemptRecord[];
  decision: PolicyDecision;
}

interface Run<C> {
  opts: RunOptions<C>;
  chainId: string;
  chainName?: string;
  state: ChainState;
  history: StepResult[];
  visits: Visit[];
  stoppedAt?: { step: StepId; reason: string };
  cancelled: boolean;
}

type EventBody<E> = E extends ChainEvent ? Omit<E, "chain_id" | "chain_name" | "at"> : never;

function emit<C>(run: Run<C>, event: EventBody<ChainEvent>): void {
  if (!run.opts.sink) return;
  run.opts.sink.emit({ ...event, chain_id: run.chainId, chain_name: run.chainName, at: new Date().toISOString() });
}

function summarize(outcome: Outcome, written: string[]): string {
  if (!outcome.ok) return `${outcome.error.kind}: ${outcome.error.message}`;
  return written.length ? `wrote ${written.join(", ")}` : "ok";
}

function applyWrites(state: ChainState, writes: StateWrite[], step: StepId): string[] {
  for (const [key, value] of writes) write(state, key, value, step);
  return writes.map(([key]) => key);
}

/** Applies the attempt's bookkeeping and writes, then appends its StepResult. */
function settleAttempt<C>(run: Run<C>, rec: AttemptRecord): void {
  const step = run.opts.chain.definition.steps[rec.position];
  const id = run.opts.chain.ids[rec.position];
  if (rec.decision.kind === "retry") writeMeta(run.state, `${id}_retry_count`, rec.attempt);
  const written = rec.decision.kind === "advance" ? applyWrites(run.state, rec.decision.writes, id) : [];
  const result: StepResult = {
    step: id,
    index: rec.position,
    operation: step.operation,
    attempt: rec.attempt,
    status: rec.outcome.ok ? "success" : "failure",
    output: rec.outcome.ok ? rec.outcome.output : undefined,
    error: rec.outcome.ok ? undefined : rec.outcome.error,
    started_at: rec.started_at,
    duration_ms: rec.duration_ms,
    written_keys: written,
    unresolved_inputs: rec.unresolved
  };
  run.history.push(Object.freeze(result));
  emit(run, {
    type: "step_finished",
    step: id,
    attempt: rec.attempt,
    status: result.status,
    duration_ms: rec.duration_ms,
    summary: summarize(rec.outcome, written)
  });
}

/** Finishes a visit: counts it and records where a stop or cancel ended the run. */
function closeVisit<C>(run: Run<C>, position: number, visit: VisitResult): void {
  const id = run.opts.chain.ids[position];
  if (visit.attempts.length > 0) {
    const d = visit.decision;
    run.visits.push({
      step: id,
      ok: d.kind === "advance" && !d.bypassed,
      bypassed: d.kind === "advance" && d.bypassed
    });
  }
  if (visit.decision.kind === "stop" && !run.stoppedAt) run.stoppedAt = { step: id, reason: visit.decision.reason };
  if (visit.decision.kind === "cancel") run.cancelled = true;
}

/**
 * Runs every attempt of one visit. Does not touch state; each finished
 * attempt is handed to `onAttempt`.
 */
async function visitStep<C>(
  run: Run<C>,
  position: number,
  args: Record<string, unknown>,
  unresolved: string[],
  onAttempt: (rec: AttemptRecord) => void
): Promise<VisitResult> {
  const { chain, registry, context, signal } = run.opts;
  const step = chain.definition.steps[position];
  const attempts: AttemptRecord[] = [];
  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) return { attempts, decision: { kind: "cancel" } };
    emit(run, {
      type: "step_started",
      step: chain.ids[position],
      index: position,
      total: chain.ids.length,
      operation: step.operation,
      attempt
    });
    const startedAt = new Date();
    const t0 = Date.now();
    const outcome = await invokeOperation(registry, step.operation, args, context, signal);
    const decision = evaluatePolicy(outcome, step, attempt, position, chain);
    const rec: AttemptRecord = {
      position,
      attempt,
      started_at: startedAt.toISOString(),
      duration_ms: Date.now() - t0,
      outcome,
      decision,
      unresolved
    };
    attempts.push(rec);
    onAttempt(rec);
    if (decision.kind !== "retry") return { attempts, decision };
  }
}

async function runSequential<C>(run: Run<C>): Promise<void> {
  const { chain, signal } = run.opts;
  const maxTransitions = run.opts.maxTransitions ?? DEFAULT_MAX_TRANSITIONS;
  let cursor = 0;
  let transitions = 0;
  while (cursor < chain.ids.length) {
    if (signal?.aborted) {
      run.cancelled = true;
      return;
    }
    if (transitions >= maxTransitions) {
      run.stoppedAt = { step: chain.ids[cursor], reason: `transition limit of ${maxTransitions} reached` };
      return;
    }
    transitions++;
    const { args, unresolved } = resolveInputs(chain.definition.steps[cursor].inputs, run.state);
    const visit = await visitStep(run, cursor, args, unresolved, rec => settleAttempt(run, rec));
    closeVisit(run, cursor, visit);
    if (visit.decision.kind !== "advance") return;
    cursor = visit.decision.next;
  }
}

async function runParallel<C>(run: Run<C>): Promise<void> {
  const steps = run.opts.chain.definition.steps;
  // every step binds against the same initial state
  const prepared = steps.map(step => resolveInputs(step.inputs, run.state));
  const settled = await Promise.allSettled(
    prepared.map(({ args, unresolved }, position) => visitStep(run, position, args, unresolved, () => {}))
  );
  // join: nothing is written, and no error surfaces, until every step has finished
  const visits: VisitResult[] = [];
  for (const s of settled) {
    if (s.status === "rejected") throw s.reason;
    visits.push(s.value);
  }
  visits.forEach((visit, position) => {
    for (const rec of visit.attempts) settleAttempt(run, rec);
    closeVisit(run, position, visit);
  });
}

export async function runChain<C>(opts: RunOptions<C>): Promise<ChainResult> {
  const mode = opts.mode ?? "sequential";
  const run: Run<C> = {
    opts,
    chainId: opts.chainId ?? randomUUID(),
    chainName: opts.chainName ?? opts.chain.definition.chain_name,
    state: createChainState(opts.initialState),
    history: [],
    visits: [],
    cancelled: false
  };
  const startedAt = new Date();
  emit(run, { type: "chain_started", mode, step_count: opts.chain.ids.length });

  if (mode === "parallel") await runParallel(run);
  else await runSequential(run);

  const t = tally(run.visits);
  const status = chainStatus(t, run.stoppedAt !== undefined, run.cancelled);
  const completedAt = new Date();
  const durationMs = completedAt.getTime() - startedAt.getTime();
  emit(run, {
    type: "chain_finished",
    status,
    steps_succeeded: t.steps_succeeded,
    steps_failed: t.steps_failed,
    duration_ms: durationMs
  });

  return {
    chain_id: run.chainId,
    chain_name: run.chainName,
    mode,
    status,
    steps_executed: t.steps_executed,
    steps_succeeded: t.steps_succeeded,
    steps_failed: t.steps_failed,
    attempts: run.history.length,
    history: run.history,
    final_state: snapshot(run.state),
    engine_meta: metaSnapshot(run.state),
    write_log: run.state.log.slice(),
    cancelled: run.cancelled,
    stopped_at: run.stoppedAt,
    started_at: startedAt.toISOString(),
    completed_at: completedAt.toISOString(),
    duration_ms: durationMs
  };
}
