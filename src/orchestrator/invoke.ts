import type { StepError } from "../types/chain.js";
import type { OperationRegistry } from "../types/operations.js";
import { lookupOperation } from "../operations/registry.js";

export type Outcome =
  | { ok: true; output: Record<string, unknown> }
  | { ok: false; error: StepError; cause?: unknown };

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Calls one operation. Never throws: a missing operation, a thrown error and
 * an abort all come back as a failed outcome.
 */
export async function invokeOperation<C>(
  reg: OperationRegistry<C>,
  name: string,
  args: Record<string, unknown>,
  context: C,
  signal?: AbortSignal
): Promise<Outcome> {
  const spec = lookupOperation(reg, name);
  if (!spec) {
    return { ok: false, error: { kind: "config", message: `operation '${name}' is not registered or is disabled` } };
  }
  if (signal?.aborted) {
    return { ok: false, error: { kind: "cancelled", message: errorMessage(signal.reason) } };
  }
  try {
    const output: unknown = await spec.invoke(args, context, signal);
    if (!isRecord(output)) {
      return { ok: false, error: { kind: "operation", message: `operation '${name}' returned a non-object result` } };
    }
    return { ok: true, output };
  } catch (e) {
    if (signal?.aborted) {
      return { ok: false, error: { kind: "cancelled", message: errorMessage(signal.reason) }, cause: e };
    }
    return { ok: false, error: { kind: "operation", message: errorMessage(e) }, cause: e };
  }
}
