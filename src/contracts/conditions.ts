/**
 * Condition wrappers for preconditions, postconditions and invariants.
 *
 * Every condition transform returns a new ContractedFunction and leaves the
 * function it was given untouched. Applied to a function that is already
 * contracted, it copies that function's checks, adds its own and wraps the
 * same original, so a function never grows more than one wrapping layer.
 * The original and all of its contracted forms share one metadata carrier.
 *
 * An enabled call runs: invariants (before), preconditions, the original,
 * postconditions, invariants (after). Within each kind, conditions run in
 * the order they were applied and stop at the first violation.
 */

import { toError } from '../core/errors.js';
import { contractEvents } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { CheckPhase } from '../core/types.js';
import { ensureMetadata, registerMetadata } from './metadata.js';
import { isVerificationEnabled } from './toggle.js';
import type {
  Callable,
  ContractedFunction,
  ContractPlan,
  Predicate,
  ResultPredicate,
} from './types.js';
import {
  ContractViolation,
  InvariantViolation,
  PostconditionViolation,
  PreconditionViolation,
} from './violations.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

type CheckSite =
  | { kind: 'precondition' }
  | { kind: 'postcondition' }
  | { kind: 'invariant'; phase: CheckPhase };

const contractedFunctions = new WeakSet<Callable>();

// ═══════════════════════════════════════════════════════════════
// PUBLIC TRANSFORMS
// ═══════════════════════════════════════════════════════════════

/**
 * Require `predicate` to hold for the call's arguments before the body runs.
 */
export function withPrecondition<A extends unknown[]>(predicate: Predicate<A>) {
  return <R>(fn: (...args: A) => R): ContractedFunction<A, R> => {
    const contracted = contractOf(fn);
    contracted.contract.checks.preconditions.push(predicate);
    contracted.contract.metadata.preconditions.push(predicate);
    return contracted;
  };
}

/**
 * Require `predicate` to hold for the result and the call's arguments after
 * the body returns. A body that throws skips the check.
 */
export function withPostcondition<A extends unknown[], R>(predicate: ResultPredicate<A, R>) {
  return (fn: (...args: A) => R): ContractedFunction<A, R> => {
    const contracted = contractOf(fn);
    contracted.contract.checks.postconditions.push(predicate);
    contracted.contract.metadata.postconditions.push(predicate);
    return contracted;
  };
}

/**
 * Require `predicate` to hold for the call's arguments both before and after
 * the body runs.
 *
 * Checks run grouped by kind, not by the order the transforms were stacked:
 * the invariant pre-check comes before every precondition, even one applied
 * outside the invariant, and the post-check after every postcondition.
 */
export function withInvariant<A extends unknown[]>(predicate: Predicate<A>) {
  return <R>(fn: (...args: A) => R): ContractedFunction<A, R> => {
    const contracted = contractOf(fn);
    contracted.contract.checks.invariants.push(predicate);
    contracted.contract.metadata.invariants.push(predicate);
    return contracted;
  };
}

/** True for functions produced by one of the condition transforms. */
export function hasContract(fn: Callable): boolean {
  return contractedFunctions.has(fn);
}

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════

function isContracted<A extends unknown[], R>(fn: (...args: A) => R): fn is ContractedFunction<A, R> {
  return contractedFunctions.has(fn);
}

function contractOf<A extends unknown[], R>(fn: (...args: A) => R): ContractedFunction<A, R> {
  const base = isContracted(fn) ? fn.contract : undefined;
  const target = base ? base.target : fn;

  const plan: ContractPlan<A, R> = {
    name: target.name || '<anonymous>',
    target,
    metadata: base ? base.metadata : ensureMetadata(target),
    checks: {
      preconditions: [...(base?.checks.preconditions ?? [])],
      postconditions: [...(base?.checks.postconditions ?? [])],
      invariants: [...(base?.checks.invariants ?? [])],
    },
  };

  const wrapper = function (this: unknown, ...args: A): R {
    return invoke(plan, this, args);
  };
  Object.defineProperty(wrapper, 'name', { value: plan.name, configurable: true });

  const contracted = Object.assign(wrapper, { contract: plan });
  contractedFunctions.add(contracted);
  registerMetadata(contracted, plan.metadata);

  getLogger().trace({ functionName: plan.name }, 'contract created');
  return contracted;
}

// ═══════════════════════════════════════════════════════════════
// INVOCATION
// ═══════════════════════════════════════════════════════════════

function invoke<A extends unknown[], R>(plan: ContractPlan<A, R>, thisArg: unknown, args: A): R {
  const { name, target, checks } = plan;

  if (!isVerificationEnabled()) {
    return target.apply(thisArg, args);
  }

  for (const invariant of checks.invariants) {
    check(name, { kind: 'invariant', phase: 'before' }, () => invariant(...args));
  }
  for (const precondition of checks.preconditions) {
    check(name, { kind: 'precondition' }, () => precondition(...args));
  }

  const result = target.apply(thisArg, args);

  for (const postcondition of checks.postconditions) {
    check(name, { kind: 'postcondition' }, () => postcondition(result, ...args));
  }
  for (const invariant of checks.invariants) {
    check(name, { kind: 'invariant', phase: 'after' }, () => invariant(...args));
  }

  return result;
}

/**
 * Evaluate one condition. A ContractViolation thrown by the predicate itself
 * propagates as is; any other error is wrapped into the site's violation kind.
 */
function check(functionName: string, site: CheckSite, evaluate: () => boolean): void {
  let holds: boolean;
  try {
    holds = evaluate();
  } catch (err) {
    if (err instanceof ContractViolation) throw err;
    const cause = toError(err);
    throw report(
      createViolation(site, functionName, `Error evaluating ${describeSite(site, functionName)}: ${cause.message}`, cause),
    );
  }

  if (!holds) {
    throw report(createViolation(site, functionName, violatedMessage(site, functionName)));
  }
}

function describeSite(site: CheckSite, functionName: string): string {
  return site.kind === 'invariant'
    ? `invariant ${site.phase} execution of ${functionName}`
    : `${site.kind} for ${functionName}`;
}

function violatedMessage(site: CheckSite, functionName: string): string {
  switch (site.kind) {
    case 'precondition':
      return `Precondition violated for function ${functionName}`;
    case 'postcondition':
      return `Postcondition violated for function ${functionName}`;
    case 'invariant':
      return `Invariant violated ${site.phase} execution of ${functionName}`;
  }
}

function createViolation(
  site: CheckSite,
  functionName: string,
  message: string,
  cause?: Error,
): ContractViolation {
  switch (site.kind) {
    case 'precondition':
      return new PreconditionViolation(message, functionName, cause);
    case 'postcondition':
      return new PostconditionViolation(message, functionName, cause);
    case 'invariant':
      return new InvariantViolation(message, functionName, site.phase, cause);
  }
}

function report(violation: ContractViolation): ContractViolation {
  const { kind, functionName, phase, message } = violation;
  getLogger().debug({ kind, functionName, phase }, message);
  contractEvents.emit('contract:violated', phase ? { kind, functionName, phase, message } : { kind, functionName, message });
  return violation;
}
