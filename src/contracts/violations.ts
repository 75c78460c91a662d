/**
 * Contract Violation Types
 *
 * Distinguishable failure kinds raised by the condition wrappers, plus the
 * two stub markers. The markers share the package base class but are never
 * contract violations, so a handler can tell "not written yet" apart from
 * "contract broken".
 */

import { StipulateError } from '../core/errors.js';
import type { CheckPhase, ContractKind } from '../core/types.js';

/**
 * Base class for all contract violations.
 */
export class ContractViolation extends StipulateError {
  constructor(
    message: string,
    code: string,
    public readonly kind: ContractKind,
    public readonly functionName: string,
    cause?: Error,
    public readonly phase?: CheckPhase,
  ) {
    super(message, code, cause);
    this.name = 'ContractViolation';
  }
}

/**
 * Thrown when a precondition is false or fails to evaluate.
 */
export class PreconditionViolation extends ContractViolation {
  constructor(message: string, functionName: string, cause?: Error) {
    super(message, 'PRECONDITION_VIOLATION', 'precondition', functionName, cause);
    this.name = 'PreconditionViolation';
  }
}

/**
 * Thrown when a postcondition is false or fails to evaluate.
 */
export class PostconditionViolation extends ContractViolation {
  constructor(message: string, functionName: string, cause?: Error) {
    super(message, 'POSTCONDITION_VIOLATION', 'postcondition', functionName, cause);
    this.name = 'PostconditionViolation';
  }
}

/**
 * Thrown when an invariant does not hold before or after the call.
 */
export class InvariantViolation extends ContractViolation {
  constructor(message: string, functionName: string, phase: CheckPhase, cause?: Error) {
    super(message, 'INVARIANT_VIOLATION', 'invariant', functionName, cause, phase);
    this.name = 'InvariantViolation';
  }
}

/**
 * Raised from a function body that is an intentional stub awaiting implementation.
 */
export class ImplementThis extends StipulateError {
  constructor(message: string = 'Not implemented yet') {
    super(message, 'IMPLEMENT_THIS');
    this.name = 'ImplementThis';
  }
}

/**
 * Raised from a function body that automated implementation should leave alone.
 */
export class DontImplementThis extends StipulateError {
  constructor(message: string = 'Intentionally left unimplemented') {
    super(message, 'DONT_IMPLEMENT_THIS');
    this.name = 'DontImplementThis';
  }
}

export type FailureClass = ContractKind | 'unimplemented' | 'skipped' | 'other';

export function isContractViolation(value: unknown): value is ContractViolation {
  return value instanceof ContractViolation;
}

/**
 * Sort a thrown value into the taxonomy.
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof ContractViolation) return error.kind;
  if (error instanceof ImplementThis) return 'unimplemented';
  if (error instanceof DontImplementThis) return 'skipped';
  return 'other';
}
