export type StepId = string;

export type ExecutionMode = "sequential" | "parallel";

export type FailureAction = "stop" | "retry" | "continue";

/** Any JSON value. Strings of the form `{{ state.key }}` or `{{ key }}` are state references. */
export type InputBinding = unknown;

export interface SuccessPolicy {
  /** result field -> state key */
  output_mappings?: Record<string, string>;
  next?: StepId;
}

export interface FailurePolicy {
  action: FailureAction;
  /** Total invocations allowed within one visit. Required for `retry`. */
  max_retries?: number;
  continue_on_max_retries?: boolean;
  next?: StepId;
}

export interface StepDefinition {
  operation: string;
  step_name?: string;
  inputs?: Record<string, InputBinding>;
  on_success?: SuccessPolicy;
  on_failure?: FailurePolicy;
}

export interface ChainDefinition {
  chain_name?: string;
  steps: StepDefinition[];
}

export type StepStatus = "success" | "failure";

export type ChainStatus = "completed" | "failed" | "partially_completed";

export type ErrorKind = "operation" | "config" | "cancelled";

export interface StepError {
  kind: ErrorKind;
  message: string;
}

export interface StepResult {
  step: StepId;
  index: number;
  operation: string;
  attempt: number;
  status: StepStatus;
  output?: Record<string, unknown>;
  error?: StepError;
  started_at: string; // ISO timestamp
  duration_ms: number;
  written_keys: string[];
  unresolved_inputs: string[];
}

export interface WriteRecord {
  key: string;
  step: StepId | undefined;
  version: number;
}

export interface ChainResult {
  chain_id: string;
  chain_name?: string;
  mode: ExecutionMode;
  status: ChainStatus;
  steps_executed: number;
  steps_succeeded: number;
  steps_failed: number;
  attempts: number;
  history: StepResult[];
  final_state: Record<string, unknown>;
  engine_meta: Record<string, number>;
  write_log: WriteRecord[];
  cancelled: boolean;
  stopped_at?: { step: StepId; reason: string };
  started_at: string;
  completed_at: string;
  duration_ms: number;
}
