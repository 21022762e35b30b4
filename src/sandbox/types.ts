/**
 * Sandbox Types
 *
 * Abstract contract for running one program under resource constraints.
 */

import type { CodeArtifact, ExecutionResult, ResourceLimits } from '../types/index.js';

/**
 * Runs untrusted code in an isolated, resource-bounded context.
 *
 * Each call creates and tears down its own context; nothing persists between
 * calls. Implementations return failures as results instead of throwing.
 */
export interface SandboxExecutor {
  /** Provider identifier (e.g., 'docker') */
  readonly name: string;

  /**
   * Get the substrate ready (e.g. pull the image) ahead of the first run,
   * so that setup time never counts against a program's time limit.
   */
  prepare(): Promise<void>;

  /**
   * Execute one code artifact.
   * @param code - Program to run
   * @param limits - Memory, CPU, network and wall-clock constraints
   * @param signal - Aborting stops the run and tears its context down
   */
  execute(code: CodeArtifact, limits: ResourceLimits, signal?: AbortSignal): Promise<ExecutionResult>;

  /**
   * Check whether the isolation substrate is reachable.
   */
  isAvailable(): Promise<boolean>;
}

/**
 * Raw outcome of a finished (or killed) process, before classification.
 */
export interface RawRunOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  oomKilled: boolean;
  /** Set when the substrate itself failed (daemon down, image missing) */
  infrastructureError: string | null;
}
