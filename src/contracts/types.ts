/**
 * Contract types.
 *
 * `A` is the argument tuple of the contracted function and `R` its return
 * type. The defaults (`never`) give the erased view used for introspection,
 * which every concrete contract is assignable to.
 */

export type Predicate<A extends unknown[] = never> = (...args: A) => boolean;

export type ResultPredicate<A extends unknown[] = never, R = never> = (result: R, ...args: A) => boolean;

/** Any function, whatever its parameters. */
export type Callable = (...args: never) => unknown;

/** An error constructor a function declares it may throw. */
export type ErrorKind = abstract new (...args: never) => Error;

/**
 * Descriptive part of a contract. Never affects control flow.
 */
export interface ContractDescription {
  specification?: string;
  preDescription?: string;
  postDescription?: string;
  invariantDescription?: string;
  raises?: ErrorKind[];
}

/**
 * The checks one contracted function enforces, in the order they were
 * applied.
 */
export interface ContractChecks<A extends unknown[] = never, R = never> {
  preconditions: Predicate<A>[];
  postconditions: ResultPredicate<A, R>[];
  invariants: Predicate<A>[];
}

/**
 * The metadata carrier. One record is shared by a plain function and every
 * contracted function derived from it; its condition lists record every
 * condition applied anywhere in that family, in application order.
 */
export interface ContractMetadata extends ContractDescription, ContractChecks {}

export interface ContractPlan<A extends unknown[], R> {
  readonly name: string;
  readonly target: (...args: A) => R;
  readonly metadata: ContractMetadata;
  readonly checks: ContractChecks<A, R>;
}

/**
 * A function wrapped by the condition engine. Callable exactly like the
 * original; `contract` exposes the original, the checks this function
 * enforces and the shared metadata carrier.
 */
export type ContractedFunction<A extends unknown[], R> = ((...args: A) => R) & {
  readonly contract: ContractPlan<A, R>;
};
