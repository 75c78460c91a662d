/**
 * Global verification toggle.
 *
 * One process-wide flag gates every condition check. Wrappers read it on
 * each invocation, so flipping it takes effect for functions contracted
 * before and after the change. Node runs this module on a single thread;
 * each worker thread loads its own copy with its own flag.
 */

import { readVerificationDefault } from '../core/config.js';
import { contractEvents } from '../core/events.js';
import { getLogger } from '../core/logger.js';

let verificationEnabled = readVerificationDefault();

export function isVerificationEnabled(): boolean {
  return verificationEnabled;
}

/**
 * Set the flag and return its previous value.
 */
export function setVerificationEnabled(enabled: boolean): boolean {
  const previous = verificationEnabled;
  verificationEnabled = enabled;
  if (previous !== enabled) {
    getLogger().info({ enabled, previous }, 'contract verification toggled');
  }
  contractEvents.emit('verification:toggled', { enabled, previous });
  return previous;
}

export function enableVerification(): void {
  setVerificationEnabled(true);
}

export function disableVerification(): void {
  setVerificationEnabled(false);
}

/**
 * Run `fn` with verification forced on or off, restoring the previous
 * setting afterwards even when `fn` throws.
 */
export function withVerification<T>(enabled: boolean, fn: () => T): T {
  const previous = setVerificationEnabled(enabled);
  try {
    return fn();
  } finally {
    setVerificationEnabled(previous);
  }
}
