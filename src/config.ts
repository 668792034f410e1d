import type { ExecutionMode } from "./types/chain.js";

export const DEFAULT_MAX_TRANSITIONS = 1000;

export interface EngineConfig {
  quiet: boolean;
  /** Console progress per step. */
  logSteps: boolean;
  /** Raw event JSON on the console. */
  logEvents: boolean;
  defaultMode: ExecutionMode;
  maxTransitions: number;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const quiet = env.QUIET === "1";
  return {
    quiet,
    logSteps: !quiet && (env.LOG_STEPS ?? "1") !== "0",
    logEvents: !quiet && (env.LOG_EVENTS ?? "0") === "1",
    defaultMode: (env.CHAIN_MODE ?? "").toLowerCase() === "parallel" ? "parallel" : "sequential",
    maxTransitions: positiveInt(env.CHAIN_MAX_TRANSITIONS, DEFAULT_MAX_TRANSITIONS)
  };
}
