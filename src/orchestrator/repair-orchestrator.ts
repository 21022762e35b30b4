/**
 * Repair Orchestrator
 *
 * Drives the execute -> diagnose -> patch loop for one program until it runs
 * cleanly, the iteration budget is spent, or no further change is possible.
 * Iterations are strictly sequential. Both the sandbox run and the patch
 * generation are bounded by deadlines enforced here, independent of the
 * collaborators' own timeouts.
 */

import { RepairEvent, RepairState, applyTransition, isTerminalState } from './state-machine.js';
import { SessionRecorder } from './session-recorder.js';
import { toResourceLimits, type AutopatchConfig } from '../config/index.js';
import { DiffEngine } from '../diff/index.js';
import { createInferenceClient, type InferenceClient } from '../patch/inference-client.js';
import { PatchGenerator } from '../patch/patch-generator.js';
import { createDockerSandboxExecutor } from '../sandbox/docker-executor.js';
import type { SandboxExecutor } from '../sandbox/types.js';
import {
  createCodeArtifact,
  ErrorType,
  PatchGenerationFailure,
} from '../types/index.js';
import type {
  CodeArtifact,
  ExecutionResult,
  FailedExecution,
  PatchRecord,
  RepairSession,
  ResourceLimits,
  TerminalState,
} from '../types/index.js';
import { DeadlineExceededError, withDeadline } from '../utils/deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

/** Default slack on top of the sandbox timeout for container setup and teardown */
export const DEFAULT_SANDBOX_GRACE_SECONDS = 10;

/** Default deadline for one patch generation */
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

/**
 * Progress callbacks. Hooks run synchronously on the loop's control flow;
 * an exception thrown by a hook is logged and ignored.
 */
export interface RepairHooks {
  onExecution?: (result: ExecutionResult, code: CodeArtifact) => void;
  onPatch?: (patch: PatchRecord) => void;
}

export interface RepairOrchestratorOptions {
  executor: SandboxExecutor;
  generator: PatchGenerator;
  limits: ResourceLimits;
  sandboxGraceSeconds?: number;
  generationTimeoutMs?: number;
  hooks?: RepairHooks;
}

export class RepairOrchestrator {
  private readonly executor: SandboxExecutor;
  private readonly generator: PatchGenerator;
  private readonly limits: ResourceLimits;
  private readonly sandboxGraceSeconds: number;
  private readonly generationTimeoutMs: number;
  private readonly hooks: RepairHooks;

  constructor(options: RepairOrchestratorOptions) {
    this.executor = options.executor;
    this.generator = options.generator;
    this.limits = options.limits;
    this.sandboxGraceSeconds = options.sandboxGraceSeconds ?? DEFAULT_SANDBOX_GRACE_SECONDS;
    this.generationTimeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.hooks = options.hooks ?? {};
  }

  /**
   * Run the repair loop. Rejects only on invalid input.
   */
  async repair(code: string, maxIterations: number): Promise<RepairSession> {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const recorder = new SessionRecorder(code);
    let state: RepairState = RepairState.RUNNING;
    let current = code;
    let iteration = 0;

    log.info(
      { sessionId: recorder.id, maxIterations, executor: this.executor.name, ai: this.generator.aiEnabled },
      'Starting repair session'
    );

    await this.prepareExecutor(recorder.id);

    while (!isTerminalState(state)) {
      const artifact = createCodeArtifact(current, iteration);

      const result = await this.executeWithDeadline(artifact);
      recorder.recordExecution(result);
      this.notify('onExecution', () => this.hooks.onExecution?.(result, artifact));

      if (result.success) {
        state = applyTransition(recorder.id, state, RepairEvent.EXECUTION_SUCCEEDED, iteration);
        break;
      }

      log.info({ sessionId: recorder.id, iteration, errorType: result.errorType }, 'Execution failed');

      if (iteration + 1 >= maxIterations) {
        state = applyTransition(recorder.id, state, RepairEvent.BUDGET_EXHAUSTED, iteration);
        break;
      }

      const patch = await this.generateWithDeadline(artifact, result);
      recorder.recordPatch(patch);
      this.notify('onPatch', () => this.hooks.onPatch?.(patch));

      if (patch.noChange || patch.fixedCode === current) {
        state = applyTransition(recorder.id, state, RepairEvent.NO_CHANGE, iteration);
        break;
      }

      state = applyTransition(recorder.id, state, RepairEvent.PATCH_APPLIED, iteration);
      current = patch.fixedCode;
      iteration++;
    }

    const terminalState: TerminalState = isTerminalState(state) ? state : RepairState.NON_RECOVERABLE;
    const session = recorder.complete(terminalState, current);

    log.info(
      {
        sessionId: session.id,
        terminalState: session.terminalState,
        totalIterations: session.totalIterations,
        patches: session.patches.length,
      },
      'Repair session complete'
    );

    return session;
  }

  /**
   * One-time setup outside any deadline. A failure here is not fatal: the
   * executor retries its setup on the first run and reports it there.
   */
  private async prepareExecutor(sessionId: string): Promise<void> {
    try {
      await this.executor.prepare();
    } catch (error) {
      log.warn({ sessionId, executor: this.executor.name, err: error }, 'Sandbox preparation failed');
    }
  }

  private async executeWithDeadline(artifact: CodeArtifact): Promise<ExecutionResult> {
    const deadlineMs = (this.limits.timeoutSeconds + this.sandboxGraceSeconds) * 1000;
    const controller = new AbortController();
    const startedAt = Date.now();

    try {
      return await withDeadline(
        this.executor.execute(artifact, this.limits, controller.signal),
        deadlineMs,
        'sandbox execution',
        () => controller.abort()
      );
    } catch (error) {
      const durationSeconds = (Date.now() - startedAt) / 1000;

      if (error instanceof DeadlineExceededError) {
        log.warn({ iteration: artifact.iteration, deadlineMs }, 'Sandbox did not return before its deadline');
        return {
          success: false,
          stdout: '',
          errorType: ErrorType.TIMEOUT,
          errorMessage: `Execution exceeded ${this.limits.timeoutSeconds} seconds. Possible infinite loop detected.`,
          stackTrace: null,
          exitCode: null,
          durationSeconds,
        };
      }

      log.error({ iteration: artifact.iteration, err: error }, 'Sandbox executor threw');
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        stdout: '',
        errorType: ErrorType.UNKNOWN,
        errorMessage: 'Sandbox infrastructure failure',
        stackTrace: message,
        exitCode: null,
        durationSeconds,
      };
    }
  }

  private async generateWithDeadline(
    artifact: CodeArtifact,
    result: FailedExecution
  ): Promise<PatchRecord> {
    const controller = new AbortController();
    const startedAt = Date.now();

    try {
      return await withDeadline(
        this.generator.generate(artifact, result, controller.signal),
        this.generationTimeoutMs,
        'patch generation',
        () => controller.abort()
      );
    } catch (error) {
      const cause =
        error instanceof DeadlineExceededError
          ? PatchGenerationFailure.BACKEND_TIMEOUT
          : PatchGenerationFailure.BACKEND_UNAVAILABLE;
      log.warn({ iteration: artifact.iteration, cause, err: error }, 'Patch generation did not complete');
      return this.generator.fallback(artifact, result, cause, startedAt);
    }
  }

  private notify(hook: keyof RepairHooks, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      log.warn({ hook, err: error }, 'Repair hook threw');
    }
  }
}

export interface RepairOrchestratorOverrides {
  executor?: SandboxExecutor;
  /** Null disables the AI path regardless of configuration */
  inference?: InferenceClient | null;
  hooks?: RepairHooks;
}

/**
 * Extra time allowed past the inference client's own timeout before the
 * orchestrator gives up on generation.
 */
const GENERATION_GRACE_MS = 2000;

/**
 * Build an orchestrator wired to Docker and the configured inference backend.
 */
export function createRepairOrchestrator(
  config: AutopatchConfig,
  overrides: RepairOrchestratorOverrides = {}
): RepairOrchestrator {
  const limits = toResourceLimits(config.sandbox);

  const executor = overrides.executor ?? createDockerSandboxExecutor(config.sandbox);
  const inference =
    overrides.inference !== undefined ? overrides.inference : createInferenceClient(config.inference);

  const generator = new PatchGenerator({
    inference,
    diffEngine: new DiffEngine(),
    limits,
  });

  return new RepairOrchestrator({
    executor,
    generator,
    limits,
    sandboxGraceSeconds: config.sandbox.graceSeconds,
    generationTimeoutMs: config.inference.timeoutMs + GENERATION_GRACE_MS,
    hooks: overrides.hooks,
  });
}
