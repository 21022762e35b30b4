/**
 * Repair Session Types
 */

import type { ExecutionResult } from './execution.js';
import type { PatchRecord } from './patch.js';

export const TerminalState = {
  SUCCESS: 'Success',
  EXHAUSTED_ITERATIONS: 'ExhaustedIterations',
  NON_RECOVERABLE: 'NonRecoverable',
} as const;

export type TerminalState = (typeof TerminalState)[keyof typeof TerminalState];

/**
 * Full audit trail of one repair request.
 */
export interface RepairSession {
  id: string;
  originalCode: string;
  finalCode: string;
  /** One entry per sandbox run, in iteration order */
  executions: readonly ExecutionResult[];
  /** One entry per iteration where a patch was attempted */
  patches: readonly PatchRecord[];
  totalIterations: number;
  terminalState: TerminalState;
  /** Null on Success */
  failureReason: string | null;
  startedAt: string;
  completedAt: string;
}
