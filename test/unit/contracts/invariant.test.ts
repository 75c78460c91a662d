import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { withInvariant } from '../../../src/contracts/conditions.js';
import { disableVerification, enableVerification } from '../../../src/contracts/toggle.js';
import { InvariantViolation } from '../../../src/contracts/violations.js';
import { captureError } from '../../helpers/capture.js';

describe('withInvariant', () => {
  let calls: number;

  function push(items: number[], value: number): number {
    calls += 1;
    items.push(value);
    return items.length;
  }

  const belowTwo = (items: number[], _value: number) => items.length < 2;

  beforeEach(() => {
    calls = 0;
    enableVerification();
  });

  afterEach(() => {
    disableVerification();
  });

  it('should check before and after a successful call', () => {
    const invariant = vi.fn(belowTwo);
    const fn = withInvariant(invariant)(push);

    expect(fn([], 1)).toBe(1);
    expect(invariant).toHaveBeenCalledTimes(2);
  });

  it('should not run the body when the invariant fails beforehand', () => {
    const fn = withInvariant(belowTwo)(push);

    const err = captureError(() => fn([1, 2], 3));

    expect(err).toBeInstanceOf(InvariantViolation);
    if (err instanceof InvariantViolation) {
      expect(err.message).toBe('Invariant violated before execution of push');
      expect(err.phase).toBe('before');
      expect(err.kind).toBe('invariant');
    }
    expect(calls).toBe(0);
  });

  it('should raise after a call that breaks the invariant', () => {
    const items: number[] = [1];
    const fn = withInvariant(belowTwo)(push);

    const err = captureError(() => fn(items, 2));

    expect(err).toBeInstanceOf(InvariantViolation);
    if (err instanceof InvariantViolation) {
      expect(err.message).toBe('Invariant violated after execution of push');
      expect(err.phase).toBe('after');
    }
    expect(calls).toBe(1);
    expect(items).toEqual([1, 2]);
  });

  it('should skip the post-check when the body throws', () => {
    const invariant = vi.fn((_x: number) => true);
    const failure = new Error('body failed');
    const fn = withInvariant(invariant)(function unstable(_x: number): number {
      throw failure;
    });

    expect(captureError(() => fn(1))).toBe(failure);
    expect(invariant).toHaveBeenCalledTimes(1);
  });

  it('should name the phase when evaluation fails', () => {
    let evaluations = 0;
    const fn = withInvariant((_items: number[], _value: number): boolean => {
      evaluations += 1;
      if (evaluations === 2) throw new Error('lost state');
      return true;
    })(push);

    const err = captureError(() => fn([], 1));

    expect(err).toBeInstanceOf(InvariantViolation);
    if (err instanceof InvariantViolation) {
      expect(err.message).toBe('Error evaluating invariant after execution of push: lost state');
      expect(err.phase).toBe('after');
      expect(err.cause?.message).toBe('lost state');
    }
    expect(calls).toBe(1);
  });

  it('should report the before phase when the first evaluation throws', () => {
    const fn = withInvariant((_items: number[], _value: number): boolean => {
      throw new Error('no state');
    })(push);

    expect(() => fn([], 1)).toThrow('Error evaluating invariant before execution of push: no state');
    expect(calls).toBe(0);
  });

  it('should not check anything when verification is disabled', () => {
    disableVerification();
    const invariant = vi.fn((_items: number[], _value: number) => false);
    const fn = withInvariant(invariant)(push);

    expect(fn([1, 2, 3], 4)).toBe(4);
    expect(invariant).not.toHaveBeenCalled();
  });
});
