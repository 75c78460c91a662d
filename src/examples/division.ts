/**
 * Division and square root with contracts attached.
 */

import {
  ImplementThis,
  PostconditionViolation,
  PreconditionViolation,
  withDeclaredErrors,
  withPostcondition,
  withPostDescription,
  withPrecondition,
  withPreDescription,
  withSpecification,
} from '../contracts/index.js';

function divPrecondition(_a: number, b: number): boolean {
  return b !== 0;
}

function divPostcondition(result: number, a: number, b: number): boolean {
  return result === Math.floor(a / b);
}

export const div = withSpecification('Divides two integers and returns the result')(
  withPreDescription('Both arguments must be integers, divisor cannot be zero')(
    withPostDescription('Returns the integer division of a by b')(
      withDeclaredErrors([PreconditionViolation, PostconditionViolation, RangeError])(
        withPostcondition(divPostcondition)(
          withPrecondition(divPrecondition)(function div(a: number, b: number): number {
            if (b === 0) {
              throw new RangeError('Division by zero');
            }
            return Math.floor(a / b);
          }),
        ),
      ),
    ),
  ),
);

function sqrtPrecondition(x: number): boolean {
  return x >= 0;
}

function sqrtPostcondition(result: number, x: number): boolean {
  return Math.abs(result * result - x) < 1e-10;
}

export const sqrt = withSpecification('Computes the square root of a non-negative number')(
  withPreDescription('Input must be non-negative')(
    withPostDescription('Result squared equals the input')(
      withPostcondition(sqrtPostcondition)(
        withPrecondition(sqrtPrecondition)(function sqrt(_x: number): number {
          throw new ImplementThis('Square root function not yet implemented');
        }),
      ),
    ),
  ),
);
