export {
  checkSystemStatus,
  checkSandbox,
  checkInference,
  type ComponentCheck,
  type ReadinessResponse,
  type SandboxStatusSource,
  type StatusDependencies,
} from './system-status.js';
