/**
 * Repair loop tests with an in-process sandbox and inference stand-ins
 */

import { describe, it, expect, vi } from 'vitest';
import { RepairOrchestrator, createRepairOrchestrator } from '../src/orchestrator/index.js';
import { loadConfig } from '../src/config/index.js';
import { classifyFailure } from '../src/sandbox/index.js';
import { PatchGenerator } from '../src/patch/index.js';
import type { InferenceClient } from '../src/patch/index.js';
import {
  DEFAULT_RESOURCE_LIMITS,
  ErrorType,
  PatchGenerationFailure,
  TerminalState,
} from '../src/types/index.js';
import type { ExecutionResult, ResourceLimits } from '../src/types/index.js';
import {
  FakeSandboxExecutor,
  StubInferenceClient,
  failed,
  jsonCompletion,
  simulatePython,
  succeeded,
  traceback,
} from './fakes.js';
import type { ExecutionHandler } from './fakes.js';

const GUARDED = [
  'try:',
  '    print(1/0)',
  'except ZeroDivisionError:',
  '    print("Error: Division by zero")',
].join('\n');

function orchestrator(
  handler: ExecutionHandler,
  inference: InferenceClient | null = null,
  extra: { limits?: ResourceLimits; sandboxGraceSeconds?: number; generationTimeoutMs?: number } = {}
): { orchestrator: RepairOrchestrator; executor: FakeSandboxExecutor } {
  const executor = new FakeSandboxExecutor(handler);
  const limits = extra.limits ?? { ...DEFAULT_RESOURCE_LIMITS };
  return {
    executor,
    orchestrator: new RepairOrchestrator({
      executor,
      generator: new PatchGenerator({ inference, limits }),
      limits,
      sandboxGraceSeconds: extra.sandboxGraceSeconds,
      generationTimeoutMs: extra.generationTimeoutMs,
    }),
  };
}

describe('RepairOrchestrator', () => {
  it('should repair a division by zero with the rule table', async () => {
    const { orchestrator: repairer, executor } = orchestrator(simulatePython);

    const session = await repairer.repair('print(1/0)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.totalIterations).toBe(2);
    expect(session.executions).toHaveLength(2);
    expect(session.patches).toHaveLength(1);
    expect(session.patches[0]).toMatchObject({
      iteration: 0,
      source: 'fallback',
      fallbackCause: PatchGenerationFailure.BACKEND_UNAVAILABLE,
      fixedCode: GUARDED,
    });
    expect(session.finalCode).toBe(GUARDED);
    expect(session.failureReason).toBeNull();
    expect(session.executions[1]).toEqual(succeeded('Error: Division by zero\n'));
    expect(executor.calls.map((call) => call.iteration)).toEqual([0, 1]);
  });

  it('should repair an undefined variable', async () => {
    const { orchestrator: repairer } = orchestrator(simulatePython);

    const session = await repairer.repair('print(undefined_var)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.finalCode).toBe('undefined_var = None  # Auto-fixed: undefined variable\nprint(undefined_var)');
    expect(session.executions[1]).toEqual(succeeded('None\n'));
  });

  it('should finish after one run when the program is already correct', async () => {
    const { orchestrator: repairer } = orchestrator(simulatePython);

    const session = await repairer.repair('print("ok")', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.totalIterations).toBe(1);
    expect(session.patches).toHaveLength(0);
    expect(session.finalCode).toBe('print("ok")');
  });

  it('should give up on a timeout that no rule can fix', async () => {
    const { orchestrator: repairer } = orchestrator(simulatePython);
    const code = 'while True:\n    pass';

    const session = await repairer.repair(code, 3);

    expect(session.terminalState).toBe(TerminalState.NON_RECOVERABLE);
    expect(session.totalIterations).toBe(1);
    expect(session.patches).toHaveLength(1);
    expect(session.patches[0]?.noChange).toBe(true);
    expect(session.finalCode).toBe(code);
    expect(session.failureReason).toBe('NonRecoverable: no automatic fix available for TimeoutError');
  });

  it('should stop when the iteration budget is spent', async () => {
    const alwaysFails = (): ExecutionResult =>
      failed(ErrorType.ZERO_DIVISION, 'division by zero', traceback(1, 'ZeroDivisionError: division by zero'));
    const { orchestrator: repairer } = orchestrator(alwaysFails);

    const session = await repairer.repair('print(1/0)', 2);

    expect(session.terminalState).toBe(TerminalState.EXHAUSTED_ITERATIONS);
    expect(session.totalIterations).toBe(2);
    expect(session.patches).toHaveLength(1);
    expect(session.finalCode).toBe(GUARDED);
    expect(session.failureReason).toBe('ExhaustedIterations: still failing with ZeroDivisionError after 2 iterations');
  });

  it('should not generate a patch with a budget of one', async () => {
    const { orchestrator: repairer } = orchestrator(simulatePython);

    const session = await repairer.repair('print(1/0)', 1);

    expect(session.terminalState).toBe(TerminalState.EXHAUSTED_ITERATIONS);
    expect(session.patches).toHaveLength(0);
    expect(session.failureReason).toBe('ExhaustedIterations: still failing with ZeroDivisionError after 1 iteration');
  });

  it('should apply an AI patch', async () => {
    const inference = new StubInferenceClient(() => jsonCompletion('print(1/1)', 'Divide by one instead'));
    const { orchestrator: repairer } = orchestrator(simulatePython, inference);

    const session = await repairer.repair('print(1/0)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.patches[0]).toMatchObject({ source: 'ai', fallbackCause: null, fixedCode: 'print(1/1)' });
    expect(session.finalCode).toBe('print(1/1)');
    expect(inference.prompts).toHaveLength(1);
  });

  it('should fall back when generation misses its deadline', async () => {
    const inference = StubInferenceClient.hanging();
    const { orchestrator: repairer } = orchestrator(simulatePython, inference, { generationTimeoutMs: 30 });

    const session = await repairer.repair('print(1/0)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.patches[0]).toMatchObject({
      source: 'fallback',
      fallbackCause: PatchGenerationFailure.BACKEND_TIMEOUT,
      fixedCode: GUARDED,
    });
    expect(inference.lastSignal?.aborted).toBe(true);
  });

  it('should synthesize a timeout when the sandbox never returns', async () => {
    const never = (): Promise<ExecutionResult> => new Promise(() => undefined);
    const { orchestrator: repairer } = orchestrator(never, null, {
      limits: { ...DEFAULT_RESOURCE_LIMITS, timeoutSeconds: 0.02 },
      sandboxGraceSeconds: 0,
    });

    const session = await repairer.repair('print(1)', 3);

    expect(session.terminalState).toBe(TerminalState.NON_RECOVERABLE);
    expect(session.executions[0]).toMatchObject({
      success: false,
      errorType: ErrorType.TIMEOUT,
      errorMessage: 'Execution exceeded 0.02 seconds. Possible infinite loop detected.',
      stdout: '',
      exitCode: null,
    });
  });

  it('should abort the run that missed its deadline', async () => {
    const never = (): Promise<ExecutionResult> => new Promise(() => undefined);
    const { orchestrator: repairer, executor } = orchestrator(never, null, {
      limits: { ...DEFAULT_RESOURCE_LIMITS, timeoutSeconds: 0.02 },
      sandboxGraceSeconds: 0,
    });

    await repairer.repair('print(1)', 3);

    expect(executor.signals).toHaveLength(1);
    expect(executor.signals[0]?.aborted).toBe(true);
  });

  it('should leave the signal of a finished run alone', async () => {
    const { orchestrator: repairer, executor } = orchestrator(simulatePython);

    await repairer.repair('print(1/0)', 3);

    expect(executor.signals.map((signal) => signal?.aborted)).toEqual([false, false]);
  });

  it('should prepare the sandbox before the first run and outside its deadline', async () => {
    const slowPull = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 60));
    const executor = new FakeSandboxExecutor(simulatePython, slowPull);
    const repairer = new RepairOrchestrator({
      executor,
      generator: new PatchGenerator({ inference: null }),
      limits: { ...DEFAULT_RESOURCE_LIMITS, timeoutSeconds: 0.02 },
      sandboxGraceSeconds: 0,
    });

    const session = await repairer.repair('print("ok")', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(session.executions).toEqual([succeeded('ok\n')]);
    expect(executor.prepareCalls).toBe(1);
  });

  it('should still run the loop when preparation fails', async () => {
    const executor = new FakeSandboxExecutor(simulatePython, async () => {
      throw new Error('pull access denied');
    });
    const repairer = new RepairOrchestrator({
      executor,
      generator: new PatchGenerator({ inference: null }),
      limits: { ...DEFAULT_RESOURCE_LIMITS },
    });

    const session = await repairer.repair('print(1/0)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(executor.calls).toHaveLength(2);
  });

  it('should finish a session whose exception shares a name with an object property', async () => {
    const stderr = traceback(3, '__main__.constructor: boom');
    const raises = (): ExecutionResult => ({
      success: false,
      stdout: '',
      ...classifyFailure(
        { exitCode: 1, stdout: '', stderr, timedOut: false, oomKilled: false, infrastructureError: null },
        5
      ),
      exitCode: 1,
      durationSeconds: 0.01,
    });
    const { orchestrator: repairer } = orchestrator(raises);

    const session = await repairer.repair('class constructor(Exception): pass\n\nraise constructor("boom")', 3);

    expect(session.terminalState).toBe(TerminalState.NON_RECOVERABLE);
    expect(session.executions[0]).toMatchObject({
      errorType: ErrorType.UNKNOWN,
      errorMessage: 'constructor: boom',
    });
    expect(session.failureReason).toBe('NonRecoverable: no automatic fix available for UnknownError');
  });

  it('should record an executor crash as an unknown failure', async () => {
    const crashes = (): ExecutionResult => {
      throw new Error('socket hang up');
    };
    const { orchestrator: repairer } = orchestrator(crashes);

    const session = await repairer.repair('print(1)', 3);

    expect(session.terminalState).toBe(TerminalState.NON_RECOVERABLE);
    expect(session.executions[0]).toMatchObject({
      success: false,
      errorType: ErrorType.UNKNOWN,
      errorMessage: 'Sandbox infrastructure failure',
      stackTrace: 'socket hang up',
    });
    expect(session.failureReason).toBe('NonRecoverable: no automatic fix available for UnknownError');
  });

  it.each([0, -1, 1.5, Number.NaN])('should reject a budget of %s', async (maxIterations) => {
    const { orchestrator: repairer, executor } = orchestrator(simulatePython);

    await expect(repairer.repair('print(1)', maxIterations)).rejects.toThrow(RangeError);
    expect(executor.calls).toHaveLength(0);
  });

  it('should pass the configured limits to every run', async () => {
    const limits: ResourceLimits = { memoryBytes: 64 * 1024 * 1024, cpuShare: 0.25, networkEnabled: false, timeoutSeconds: 2 };
    const { orchestrator: repairer, executor } = orchestrator(simulatePython, null, { limits });

    await repairer.repair('print(1/0)', 3);

    expect(executor.limitsSeen).toEqual([limits, limits]);
  });

  it('should report progress through hooks and survive a throwing hook', async () => {
    const onExecution = vi.fn(() => {
      throw new Error('display failed');
    });
    const onPatch = vi.fn();
    const executor = new FakeSandboxExecutor(simulatePython);
    const repairer = new RepairOrchestrator({
      executor,
      generator: new PatchGenerator({ inference: null }),
      limits: { ...DEFAULT_RESOURCE_LIMITS },
      hooks: { onExecution, onPatch },
    });

    const session = await repairer.repair('print(1/0)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(onExecution).toHaveBeenCalledTimes(2);
    expect(onPatch).toHaveBeenCalledTimes(1);
    expect(onPatch).toHaveBeenCalledWith(session.patches[0]);
  });
});

describe('createRepairOrchestrator', () => {
  it('should wire overrides in place of Docker and the backend', async () => {
    const executor = new FakeSandboxExecutor(simulatePython);
    const repairer = createRepairOrchestrator(
      loadConfig({ AUTOPATCH_SANDBOX_MEMORY_MB: '64' }),
      { executor, inference: null }
    );

    const session = await repairer.repair('print(undefined_var)', 3);

    expect(session.terminalState).toBe(TerminalState.SUCCESS);
    expect(executor.limitsSeen[0]?.memoryBytes).toBe(64 * 1024 * 1024);
    expect(session.patches[0]?.fallbackCause).toBe(PatchGenerationFailure.BACKEND_UNAVAILABLE);
  });
});
