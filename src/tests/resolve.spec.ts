import { describe, it, expect } from 'vitest';
import { resolveInputs, referencedKey } from '../orchestrator/resolve.js';
import { createChainState, writeMeta } from '../state/index.js';

describe('resolveInputs', () => {
  it('substitutes references and passes literals through', () => {
    const st = createChainState({ q: 'hi', n: 0, 'a.b': 1 });
    const { args, unresolved } = resolveInputs({
      x: '{{ state.q }}',
      y: '{{q}}',
      n: '{{ n }}',
      dotted: '{{ state.a.b }}',
      lit: 'q',
      mixed: '{{ state.q }} suffix',
      num: 5,
      obj: { k: '{{ q }}' }
    }, st);
    expect(args).toEqual({
      x: 'hi',
      y: 'hi',
      n: 0,
      dotted: 1,
      lit: 'q',
      mixed: '{{ state.q }} suffix',
      num: 5,
      obj: { k: '{{ q }}' }
    });
    expect(unresolved).toEqual([]);
  });

  it('resolves missing keys to undefined and reports them', () => {
    const st = createChainState();
    const { args, unresolved } = resolveInputs({ z: '{{ state.missing }}', w: 'plain' }, st);
    expect('z' in args).toBe(true);
    expect(args.z).toBeUndefined();
    expect(unresolved).toEqual(['z']);
  });

  it('cannot read engine metadata', () => {
    const st = createChainState();
    writeMeta(st, '#0_retry_count', 1);
    const { args, unresolved } = resolveInputs({ c: '{{ #0_retry_count }}' }, st);
    expect(args.c).toBeUndefined();
    expect(unresolved).toEqual(['c']);
  });

  it('only recognises whole-string templates', () => {
    expect(referencedKey('{{ state.user_id }}')).toBe('user_id');
    expect(referencedKey('{{user_id}}')).toBe('user_id');
    expect(referencedKey('state.user_id')).toBeUndefined();
    expect(referencedKey('{{ a b }}')).toBeUndefined();
    expect(referencedKey(42)).toBeUndefined();
  });
});
