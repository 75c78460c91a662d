/**
 * stipulate: runtime Design-by-Contract for TypeScript
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { enableVerification, withPrecondition, withSpecification } from 'stipulate';
 *
 * const div = withSpecification('Integer division')(
 *   withPrecondition((_a: number, b: number) => b !== 0)(
 *     function div(a: number, b: number): number {
 *       return Math.floor(a / b);
 *     },
 *   ),
 * );
 *
 * enableVerification();
 * div(10, 0); // throws PreconditionViolation
 * ```
 */

// Core
export { EventBus, contractEvents } from './core/events.js';
export { loadConfig, parseFlag, readVerificationDefault, type Env } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export { StipulateError, ConfigError } from './core/errors.js';
export type {
  StipulateConfig,
  StipulateConfigInput,
  StipulateEvents,
  ContractKind,
  CheckPhase,
  ContractViolatedEvent,
  VerificationToggledEvent,
  LogLevel,
} from './core/types.js';

// Contracts
export * from './contracts/index.js';
