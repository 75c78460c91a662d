/**
 * Metadata carrier side table and the metadata-only transforms.
 *
 * Carriers are keyed on function identity. The transforms here write
 * descriptive fields and hand back the very function they were given.
 */

import type { Callable, ContractMetadata, ErrorKind } from './types.js';

const carriers = new WeakMap<Callable, ContractMetadata>();

export function getContractMetadata(fn: Callable): Readonly<ContractMetadata> | undefined {
  return carriers.get(fn);
}

/**
 * Get the carrier for `fn`, creating an empty one if it has none.
 */
export function ensureMetadata(fn: Callable): ContractMetadata {
  let metadata = carriers.get(fn);
  if (!metadata) {
    metadata = { preconditions: [], postconditions: [], invariants: [] };
    carriers.set(fn, metadata);
  }
  return metadata;
}

/** Make `fn` share an existing carrier. */
export function registerMetadata(fn: Callable, metadata: ContractMetadata): void {
  carriers.set(fn, metadata);
}

function annotate(write: (metadata: ContractMetadata) => void) {
  return <F extends Callable>(fn: F): F => {
    write(ensureMetadata(fn));
    return fn;
  };
}

export function withSpecification(text: string) {
  return annotate((metadata) => {
    metadata.specification = text;
  });
}

export function withPreDescription(text: string) {
  return annotate((metadata) => {
    metadata.preDescription = text;
  });
}

export function withPostDescription(text: string) {
  return annotate((metadata) => {
    metadata.postDescription = text;
  });
}

export function withInvariantDescription(text: string) {
  return annotate((metadata) => {
    metadata.invariantDescription = text;
  });
}

/**
 * Declare the errors a function may throw. Replaces any earlier declaration.
 * Purely informational; nothing checks what the function actually throws.
 */
export function withDeclaredErrors(kinds: readonly ErrorKind[]) {
  return annotate((metadata) => {
    metadata.raises = [...kinds];
  });
}
