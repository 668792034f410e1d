import type { ChainStatus, ExecutionMode, StepId, StepStatus } from "./chain.js";

interface EventBase {
  chain_id: string;
  chain_name?: string;
  at: string; // ISO timestamp
}

export interface ChainStartedEvent extends EventBase {
  type: "chain_started";
  mode: ExecutionMode;
  step_count: number;
}

export interface StepStartedEvent extends EventBase {
  type: "step_started";
  step: StepId;
  index: number;
  total: number;
  operation: string;
  attempt: number;
}

export interface StepFinishedEvent extends EventBase {
  type: "step_finished";
  step: StepId;
  attempt: number;
  status: StepStatus;
  duration_ms: number;
  summary: string;
}

export interface ChainFinishedEvent extends EventBase {
  type: "chain_finished";
  status: ChainStatus;
  steps_succeeded: number;
  steps_failed: number;
  duration_ms: number;
}

export type ChainEvent = ChainStartedEvent | StepStartedEvent | StepFinishedEvent | ChainFinishedEvent;

export interface EventSink {
  emit(event: ChainEvent): void;
}
