import type { OperationRegistry, OperationSpec } from "../types/operations.js";

export function buildOperationRegistry<C = unknown>(specs: OperationSpec<C>[]): OperationRegistry<C> {
  const reg: OperationRegistry<C> = {};
  for (const spec of specs) {
    if (Object.hasOwn(reg, spec.name)) throw new Error(`Duplicate operation name: ${spec.name}`);
    reg[spec.name] = spec;
  }
  return reg;
}

/** Returns the operation only when it is registered under its own key and enabled. */
export function lookupOperation<C>(reg: OperationRegistry<C>, name: string): OperationSpec<C> | undefined {
  if (!Object.hasOwn(reg, name)) return undefined;
  const spec = reg[name];
  return spec.enabled === false ? undefined : spec;
}
