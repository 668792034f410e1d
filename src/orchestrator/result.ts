import type { ChainStatus, StepId } from "../types/chain.js";

export interface Visit {
  step: StepId;
  ok: boolean;
  bypassed: boolean;
}

export interface Tally {
  steps_executed: number;
  steps_succeeded: number;
  steps_failed: number;
  bypassed: number;
}

export function tally(visits: Visit[]): Tally {
  const succeeded = visits.filter(v => v.ok).length;
  return {
    steps_executed: visits.length,
    steps_succeeded: succeeded,
    steps_failed: visits.length - succeeded,
    bypassed: visits.filter(v => v.bypassed).length
  };
}

export function chainStatus(t: Tally, stopped: boolean, cancelled: boolean): ChainStatus {
  if (stopped) return "failed";
  if (cancelled) return "partially_completed";
  if (t.bypassed > 0) return t.steps_succeeded > 0 ? "partially_completed" : "failed";
  return "completed";
}
