import { describe, it, expect } from 'vitest';
import { compileChain } from '../orchestrator/compiler.js';
import { ChainConfigError } from '../orchestrator/errors.js';
import { buildOperationRegistry } from '../operations/registry.js';
import { succeed } from './fakes.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ChainConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ChainConfigError');
}

describe('compileChain', () => {
  it('labels unnamed steps by position and indexes only names', () => {
    const out = compileChain({ steps: [{ operation: 'a' }, { operation: 'b', step_name: 'named' }] });
    expect(out.ids).toEqual(['#0', 'named']);
    expect(out.index.get('named')).toBe(1);
    expect(out.index.has('#0')).toBe(false);
  });

  it('accepts any step name, including one shaped like a position', () => {
    const out = compileChain({ steps: [{ operation: 'a', step_name: 'step_1' }, { operation: 'b' }] });
    expect(out.ids).toEqual(['step_1', '#1']);
    expect(out.index.get('step_1')).toBe(0);
  });

  it('reserves the # prefix for positional labels', () => {
    expect(issuesOf(() => compileChain({ steps: [{ operation: 'a', step_name: '#1' }] }))).toEqual([
      "steps.0.step_name: step names may not start with '#'"
    ]);
  });

  it('rejects an empty chain', () => {
    expect(issuesOf(() => compileChain({ steps: [] }))).toEqual(['steps: chain must declare at least one step']);
  });

  it('requires max_retries on a retry policy', () => {
    const draft = { steps: [{ operation: 'a', on_failure: { action: 'retry' } }] };
    expect(issuesOf(() => compileChain(draft))).toEqual([
      'steps.0.on_failure.max_retries: max_retries is required when action is retry'
    ]);
  });

  it('rejects unknown fields', () => {
    expect(issuesOf(() => compileChain({ steps: [{ operation: 'a', tool: 'x' }] }))).toEqual([
      "steps.0: Unrecognized key(s) in object: 'tool'"
    ]);
  });

  it('rejects dangling jump targets before anything runs', () => {
    const draft = {
      steps: [
        { operation: 'a', step_name: 'first', on_success: { next: 'nowhere' } },
        { operation: 'b', on_failure: { action: 'continue', next: 'first' } }
      ]
    };
    expect(issuesOf(() => compileChain(draft))).toEqual(["steps.0.on_success.next: unknown step 'nowhere'"]);
  });

  it('rejects duplicate step names', () => {
    const draft = { steps: [{ operation: 'a', step_name: 'x' }, { operation: 'b', step_name: 'x' }] };
    expect(issuesOf(() => compileChain(draft))).toEqual(["steps.1: duplicate step name 'x'"]);
  });

  it('rejects branching in parallel mode', () => {
    const draft = { steps: [{ operation: 'a', on_success: { next: 'b' } }, { operation: 'b', step_name: 'b' }] };
    expect(compileChain(draft).ids).toEqual(['#0', 'b']);
    expect(issuesOf(() => compileChain(draft, { mode: 'parallel' }))).toEqual([
      'steps.0.on_success.next: branching is not supported in parallel mode'
    ]);
  });

  it('checks operations against the registry when one is given', () => {
    const registry = buildOperationRegistry([succeed('known')]);
    const draft = { chain_name: 'demo', steps: [{ operation: 'known' }, { operation: 'ghost' }] };
    expect(() => compileChain(draft)).not.toThrow();
    expect(() => compileChain(draft, { registry })).toThrow(
      "Chain 'demo' is not runnable: steps.1.operation: operation 'ghost' is not registered or is disabled"
    );
  });
});
