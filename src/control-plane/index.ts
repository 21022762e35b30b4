// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  cyan,
  formatTerminalState,
  formatDuration,
  padRight,
  formatDiff,
  formatFailure,
  formatExecution,
  formatPatch,
  formatSessionSummary,
  formatSessionDetail,
  formatReadiness,
  formatSessionList,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  formatJson,
  print,
  printError,
} from './formatter.js';

// Validators
export {
  validate,
  validateOrThrow,
  sessionIdSchema,
  repairCommandOptionsSchema,
  statusCommandOptionsSchema,
  showCommandOptionsSchema,
  cleanupCommandOptionsSchema,
  type ValidationResult,
  type ValidationError,
  type RepairCommandOptions,
  type StatusCommandOptions,
  type ShowCommandOptions,
  type CleanupCommandOptions,
} from './validators.js';

// CLI
export { createProgram, runCli } from './cli.js';
export { createRepairCommand } from './commands/repair.js';
export { createStatusCommand } from './commands/status.js';
export { createShowCommand, createSessionsCommand } from './commands/show.js';
export { createCleanupCommand } from './commands/cleanup.js';
