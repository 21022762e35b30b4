export {
  RepairOrchestrator,
  createRepairOrchestrator,
  DEFAULT_SANDBOX_GRACE_SECONDS,
  DEFAULT_GENERATION_TIMEOUT_MS,
  type RepairHooks,
  type RepairOrchestratorOptions,
  type RepairOrchestratorOverrides,
} from './repair-orchestrator.js';
export { SessionRecorder, SessionClosedError, formatFailureReason } from './session-recorder.js';
export {
  RepairState,
  RepairEvent,
  applyTransition,
  getNextState,
  isTerminalState,
} from './state-machine.js';
