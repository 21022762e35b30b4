// Error classification
export {
  ErrorType,
  ERROR_TYPES,
  ERROR_TYPE_DESCRIPTIONS,
  isErrorType,
} from './error-type.js';

// Execution
export {
  createCodeArtifact,
  describeExecutionFailure,
  DEFAULT_RESOURCE_LIMITS,
  type CodeArtifact,
  type ResourceLimits,
  type SuccessfulExecution,
  type FailedExecution,
  type ExecutionResult,
  type ExecutionFailure,
} from './execution.js';

// Patches
export {
  PatchGenerationFailure,
  type LineEdit,
  type LineEditKind,
  type PatchSource,
  type PatchRecord,
} from './patch.js';

// Sessions
export { TerminalState, type RepairSession } from './session.js';
