import { describe, it, expect } from 'vitest';
import { deepFreeze, withTimeout } from '../runtime/utils.js';

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = { a: { b: [1, { c: 2 }] } };
    deepFreeze(value);
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[1])).toBe(true);
  });

  it('survives shared references', () => {
    const shared = { x: 1 };
    const value = { left: shared, right: shared };
    expect(deepFreeze(value)).toBe(value);
    expect(Object.isFrozen(shared)).toBe(true);
  });
});

describe('withTimeout', () => {
  it('resolves with the result when it arrives in time', async () => {
    await expect(withTimeout(async () => 42, 100, () => new Error('late'))).resolves.toBe(42);
  });

  it('passes the rejection through', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('upstream');
        },
        100,
        () => new Error('late')
      )
    ).rejects.toThrow('upstream');
  });

  it('rejects and aborts once the deadline passes', async () => {
    const captured: { signal?: AbortSignal } = {};
    const hung = (signal: AbortSignal) => {
      captured.signal = signal;
      return new Promise<number>(() => undefined);
    };

    await expect(withTimeout(hung, 20, () => new Error('late'))).rejects.toThrow('late');
    expect(captured.signal?.aborted).toBe(true);
  });
});
