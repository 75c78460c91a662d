export {
  enableVerification,
  disableVerification,
  isVerificationEnabled,
  setVerificationEnabled,
  withVerification,
} from './toggle.js';
export {
  getContractMetadata,
  withSpecification,
  withPreDescription,
  withPostDescription,
  withInvariantDescription,
  withDeclaredErrors,
} from './metadata.js';
export { withPrecondition, withPostcondition, withInvariant, hasContract } from './conditions.js';
export {
  ContractViolation,
  PreconditionViolation,
  PostconditionViolation,
  InvariantViolation,
  ImplementThis,
  DontImplementThis,
  classifyFailure,
  isContractViolation,
  type FailureClass,
} from './violations.js';
export {
  renderContract,
  summarizeContract,
  type ContractFormat,
  type ContractSummary,
} from './render.js';
export type {
  Predicate,
  ResultPredicate,
  Callable,
  ErrorKind,
  ContractDescription,
  ContractChecks,
  ContractMetadata,
  ContractPlan,
  ContractedFunction,
} from './types.js';
