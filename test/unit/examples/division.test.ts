import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { div, sqrt } from '../../../src/examples/division.js';
import { getContractMetadata } from '../../../src/contracts/metadata.js';
import { disableVerification, enableVerification } from '../../../src/contracts/toggle.js';
import {
  classifyFailure,
  ImplementThis,
  PostconditionViolation,
  PreconditionViolation,
} from '../../../src/contracts/violations.js';
import { captureError } from '../../helpers/capture.js';

describe('div', () => {
  afterEach(() => {
    disableVerification();
  });

  it('should divide when verification is enabled', () => {
    enableVerification();

    expect(div(10, 2)).toBe(5);
    expect(div(7, 2)).toBe(3);
    expect(div(-7, 2)).toBe(-4);
  });

  it('should reject a zero divisor with a precondition violation', () => {
    enableVerification();

    const err = captureError(() => div(10, 0));

    expect(err).toBeInstanceOf(PreconditionViolation);
    if (err instanceof PreconditionViolation) {
      expect(err.message).toBe('Precondition violated for function div');
    }
  });

  it('should surface the arithmetic error when verification is disabled', () => {
    disableVerification();

    const err = captureError(() => div(10, 0));

    expect(err).toBeInstanceOf(RangeError);
    if (err instanceof RangeError) {
      expect(err.message).toBe('Division by zero');
    }
  });

  it('should carry its descriptive metadata', () => {
    const metadata = getContractMetadata(div);

    expect(metadata?.specification).toBe('Divides two integers and returns the result');
    expect(metadata?.preDescription).toBe('Both arguments must be integers, divisor cannot be zero');
    expect(metadata?.postDescription).toBe('Returns the integer division of a by b');
    expect(metadata?.raises).toEqual([PreconditionViolation, PostconditionViolation, RangeError]);
    expect(metadata?.preconditions).toHaveLength(1);
    expect(metadata?.postconditions).toHaveLength(1);
  });
});

describe('sqrt', () => {
  beforeEach(() => {
    enableVerification();
  });

  afterEach(() => {
    disableVerification();
  });

  it('should signal that it is a stub for valid input', () => {
    const err = captureError(() => sqrt(4));

    expect(err).toBeInstanceOf(ImplementThis);
    expect(classifyFailure(err)).toBe('unimplemented');
    if (err instanceof ImplementThis) {
      expect(err.message).toBe('Square root function not yet implemented');
    }
  });

  it('should reject negative input before reaching the stub', () => {
    const err = captureError(() => sqrt(-1));

    expect(err).toBeInstanceOf(PreconditionViolation);
    expect(classifyFailure(err)).toBe('precondition');
  });
});
