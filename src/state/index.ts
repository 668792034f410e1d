import type { StepId, WriteRecord } from "../types/chain.js";

export interface StateVersion<T = unknown> {
  v: number;
  value: T;
  at: string; // ISO timestamp
  written_by?: StepId;
}

export interface ChainState {
  values: Map<string, StateVersion[]>;
  /** Engine bookkeeping (retry counters). Never visible to input references. */
  meta: Map<string, number>;
  log: WriteRecord[];
}

export function createChainState(initial: Record<string, unknown> = {}): ChainState {
  const state: ChainState = { values: new Map(), meta: new Map(), log: [] };
  for (const [k, v] of Object.entries(initial)) {
    write(state, k, v);
  }
  return state;
}

export function read<T = unknown>(state: ChainState, key: string, latest: boolean = true): T | undefined {
  const arr = state.values.get(key);
  if (!arr || arr.length === 0) return undefined;
  return (latest ? arr[arr.length - 1] : arr[0]).value as T;
}

export function write<T = unknown>(state: ChainState, key: string, value: T, writtenBy?: StepId): StateVersion<T> {
  const now = new Date().toISOString();
  const arr = state.values.get(key) ?? [];
  const v = (arr[arr.length - 1]?.v ?? 0) + 1;
  const rec: StateVersion<T> = { v, value, at: now, written_by: writtenBy };
  arr.push(rec);
  state.values.set(key, arr);
  state.log.push({ key, step: writtenBy, version: v });
  return rec;
}

export function exists(state: ChainState, key: string): boolean {
  const v = state.values.get(key);
  return !!(v && v.length > 0);
}

export function keys(state: ChainState): string[] {
  return Array.from(state.values.keys());
}

export function history(state: ChainState, key: string): StateVersion[] {
  return (state.values.get(key) ?? []).slice();
}

export function readMeta(state: ChainState, key: string): number | undefined {
  return state.meta.get(key);
}

export function writeMeta(state: ChainState, key: string, value: number): void {
  state.meta.set(key, value);
}

/** Latest value of every key, without versions or timestamps. */
export function snapshot(state: ChainState): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const k of keys(state)) out[k] = read(state, k);
  return out;
}

export function metaSnapshot(state: ChainState): Record<string, number> {
  return Object.fromEntries(state.meta);
}
