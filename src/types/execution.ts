/**
 * Execution Types
 *
 * Inputs and outcomes of a single sandbox run.
 */

import { ErrorType } from './error-type.js';

/**
 * One version of the program under repair.
 */
export interface CodeArtifact {
  readonly source: string;
  /** Iteration that produced this version (0 = caller's original) */
  readonly iteration: number;
}

export function createCodeArtifact(source: string, iteration: number): CodeArtifact {
  return Object.freeze({ source, iteration });
}

/**
 * Constraints applied to every sandbox run.
 */
export interface ResourceLimits {
  /** Hard memory cap; breaching it kills the run with MemoryError */
  memoryBytes: number;
  /** Fractional CPU throttle (0.5 = half a core), not a hard cap */
  cpuShare: number;
  /** Only enable for diagnostic runs of trusted code */
  networkEnabled: boolean;
  /** Wall-clock cap enforced by killing the container */
  timeoutSeconds: number;
}

export const DEFAULT_RESOURCE_LIMITS: Readonly<ResourceLimits> = Object.freeze({
  memoryBytes: 128 * 1024 * 1024,
  cpuShare: 0.5,
  networkEnabled: false,
  timeoutSeconds: 5,
});

export interface SuccessfulExecution {
  success: true;
  stdout: string;
  durationSeconds: number;
}

export interface FailedExecution {
  success: false;
  stdout: string;
  errorType: ErrorType;
  /** Raw traceback or infrastructure message, if any was captured */
  stackTrace: string | null;
  /** Message part of the final `Name: message` traceback line */
  errorMessage: string | null;
  exitCode: number | null;
  durationSeconds: number;
}

export type ExecutionResult = SuccessfulExecution | FailedExecution;

/**
 * Execution failure taxonomy, derived from a failed result.
 */
export type ExecutionFailure =
  | { kind: 'Timeout' }
  | { kind: 'MemoryExceeded' }
  | { kind: 'RuntimeError'; errorType: ErrorType; stackTrace: string | null }
  | { kind: 'UnknownFailure'; stackTrace: string | null };

export function describeExecutionFailure(result: FailedExecution): ExecutionFailure {
  switch (result.errorType) {
    case ErrorType.TIMEOUT:
      return { kind: 'Timeout' };
    case ErrorType.MEMORY:
      return { kind: 'MemoryExceeded' };
    case ErrorType.UNKNOWN:
      return { kind: 'UnknownFailure', stackTrace: result.stackTrace };
    default:
      return {
        kind: 'RuntimeError',
        errorType: result.errorType,
        stackTrace: result.stackTrace,
      };
  }
}
