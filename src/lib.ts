/**
 * autopatch Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export {
  RepairOrchestrator,
  createRepairOrchestrator,
  SessionRecorder,
  SessionClosedError,
  type RepairHooks,
  type RepairOrchestratorOptions,
  type RepairOrchestratorOverrides,
} from './orchestrator/index.js';

// Configuration
export {
  loadConfig,
  toResourceLimits,
  configSchema,
  type AutopatchConfig,
  type SandboxConfig,
  type InferenceConfig,
} from './config/index.js';

// Sandbox
export * as sandbox from './sandbox/index.js';

// Patch generation
export * as patch from './patch/index.js';

// Diff
export { DiffEngine, applyLineEdits, type DiffResult } from './diff/index.js';

// Artifacts
export * as artifacts from './artifacts/index.js';

// Status
export { checkSystemStatus, type ReadinessResponse, type ComponentCheck } from './status/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
export { withDeadline, DeadlineExceededError } from './utils/deadline.js';
