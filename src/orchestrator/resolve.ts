import type { InputBinding } from "../types/chain.js";
import type { ChainState } from "../state/index.js";
import { exists, read } from "../state/index.js";

// {{ state.key }} or {{ key }}; the key is taken verbatim, dots included.
const REFERENCE = /^\{\{\s*(?:state\.)?([^{}\s]+)\s*\}\}$/;

export interface ResolvedInputs {
  args: Record<string, unknown>;
  /** Input names whose reference had no value in state. */
  unresolved: string[];
}

export function referencedKey(binding: InputBinding): string | undefined {
  if (typeof binding !== "string") return undefined;
  return REFERENCE.exec(binding)?.[1];
}

export function resolveInputs(inputs: Record<string, InputBinding> = {}, state: ChainState): ResolvedInputs {
  const args: Record<string, unknown> = {};
  const unresolved: string[] = [];
  for (const [name, binding] of Object.entries(inputs)) {
    const key = referencedKey(binding);
    if (key === undefined) {
      args[name] = binding;
      continue;
    }
    if (!exists(state, key)) unresolved.push(name);
    args[name] = read(state, key);
  }
  return { args, unresolved };
}
