/**
 * Session Recorder
 *
 * Append-only accumulator for one repair session. Completing the session
 * returns a deep-frozen RepairSession; any later append throws.
 */

import { nanoid } from 'nanoid';
import { ErrorType, TerminalState } from '../types/index.js';
import type { ExecutionResult, PatchRecord, RepairSession } from '../types/index.js';

/**
 * Error thrown when a completed session is modified.
 */
export class SessionClosedError extends Error {
  readonly name = 'SessionClosedError';
  readonly sessionId: string;

  constructor(sessionId: string, operation: string) {
    super(`Session ${sessionId} is complete; cannot ${operation}`);
    this.sessionId = sessionId;
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Human-readable reason for a non-successful terminal state.
 */
export function formatFailureReason(
  terminalState: TerminalState,
  lastExecution: ExecutionResult | undefined,
  totalIterations: number
): string | null {
  if (terminalState === TerminalState.SUCCESS) {
    return null;
  }

  const errorType =
    lastExecution && !lastExecution.success ? lastExecution.errorType : ErrorType.UNKNOWN;

  if (terminalState === TerminalState.EXHAUSTED_ITERATIONS) {
    const noun = totalIterations === 1 ? 'iteration' : 'iterations';
    return `ExhaustedIterations: still failing with ${errorType} after ${totalIterations} ${noun}`;
  }
  return `NonRecoverable: no automatic fix available for ${errorType}`;
}

export class SessionRecorder {
  readonly id: string;
  readonly originalCode: string;
  readonly startedAt: string;

  private readonly executions: ExecutionResult[] = [];
  private readonly patches: PatchRecord[] = [];
  private completed: RepairSession | null = null;

  constructor(originalCode: string, id: string = nanoid(12)) {
    this.id = id;
    this.originalCode = originalCode;
    this.startedAt = new Date().toISOString();
  }

  private get lastExecution(): ExecutionResult | undefined {
    return this.executions[this.executions.length - 1];
  }

  recordExecution(result: ExecutionResult): void {
    this.assertOpen('record an execution');
    this.executions.push(result);
  }

  recordPatch(patch: PatchRecord): void {
    this.assertOpen('record a patch');
    this.patches.push(patch);
  }

  complete(
    terminalState: TerminalState,
    finalCode: string,
    failureReason: string | null = formatFailureReason(
      terminalState,
      this.lastExecution,
      this.executions.length
    )
  ): RepairSession {
    this.assertOpen('complete it again');

    const session: RepairSession = {
      id: this.id,
      originalCode: this.originalCode,
      finalCode,
      // Copies, so the frozen session shares nothing with the recorder
      executions: this.executions.map((result) => ({ ...result })),
      patches: this.patches.map((patch) => ({
        ...patch,
        lineEdits: patch.lineEdits.map((edit) => ({ ...edit })),
      })),
      totalIterations: this.executions.length,
      terminalState,
      failureReason,
      startedAt: this.startedAt,
      completedAt: new Date().toISOString(),
    };

    this.completed = deepFreeze(session);
    return this.completed;
  }

  private assertOpen(operation: string): void {
    if (this.completed) {
      throw new SessionClosedError(this.id, operation);
    }
  }
}
