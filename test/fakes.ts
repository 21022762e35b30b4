/**
 * In-process stand-ins for the sandbox and the inference backend.
 */

import type { InferenceClient } from '../src/patch/index.js';
import type { SandboxExecutor } from '../src/sandbox/index.js';
import { ErrorType } from '../src/types/index.js';
import type {
  CodeArtifact,
  ExecutionResult,
  FailedExecution,
  ResourceLimits,
} from '../src/types/index.js';

export function succeeded(stdout = ''): ExecutionResult {
  return { success: true, stdout, durationSeconds: 0.01 };
}

export function failed(
  errorType: ErrorType,
  errorMessage: string | null,
  stackTrace: string | null = null
): FailedExecution {
  return {
    success: false,
    stdout: '',
    errorType,
    errorMessage,
    stackTrace,
    exitCode: 1,
    durationSeconds: 0.01,
  };
}

/**
 * Traceback as `python -c` prints it for an error on the given line.
 */
export function traceback(line: number, exception: string): string {
  return [
    'Traceback (most recent call last):',
    `  File "<string>", line ${line}, in <module>`,
    exception,
  ].join('\n');
}

export type ExecutionHandler = (code: CodeArtifact) => ExecutionResult | Promise<ExecutionResult>;

/**
 * Sandbox executor whose outcome is decided by a test-supplied handler.
 */
export class FakeSandboxExecutor implements SandboxExecutor {
  readonly name = 'fake';
  readonly calls: CodeArtifact[] = [];
  readonly limitsSeen: ResourceLimits[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  prepareCalls = 0;

  constructor(
    private readonly handler: ExecutionHandler,
    private readonly onPrepare: () => Promise<void> = async () => undefined
  ) {}

  /**
   * Return the scripted results in order, repeating the last one.
   */
  static sequence(results: ExecutionResult[]): FakeSandboxExecutor {
    return new FakeSandboxExecutor((code) => {
      const result = results[Math.min(code.iteration, results.length - 1)];
      if (!result) throw new Error('No scripted execution result');
      return result;
    });
  }

  async prepare(): Promise<void> {
    this.prepareCalls++;
    await this.onPrepare();
  }

  async execute(code: CodeArtifact, limits: ResourceLimits, signal?: AbortSignal): Promise<ExecutionResult> {
    this.calls.push(code);
    this.limitsSeen.push(limits);
    this.signals.push(signal);
    return this.handler(code);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Interpreter stand-in for the handful of programs the repair tests use.
 */
export function simulatePython(code: CodeArtifact): ExecutionResult {
  const source = code.source;

  if (source.includes('while True')) {
    return failed(ErrorType.TIMEOUT, 'Execution exceeded 5 seconds. Possible infinite loop detected.');
  }
  if (source.includes('1/0') && !source.includes('except ZeroDivisionError')) {
    return failed(
      ErrorType.ZERO_DIVISION,
      'division by zero',
      traceback(1, 'ZeroDivisionError: division by zero')
    );
  }
  if (source.includes('undefined_var') && !source.includes('undefined_var = None')) {
    return failed(
      ErrorType.NAME,
      "name 'undefined_var' is not defined",
      traceback(1, "NameError: name 'undefined_var' is not defined")
    );
  }
  if (source.includes('except ZeroDivisionError')) {
    return succeeded('Error: Division by zero\n');
  }
  return succeeded(source.includes('undefined_var') ? 'None\n' : 'ok\n');
}

export type CompletionHandler = (prompt: string, signal?: AbortSignal) => string | Promise<string>;

/**
 * Inference client answering from a test-supplied handler.
 */
export class StubInferenceClient implements InferenceClient {
  readonly model = 'stub-model';
  readonly prompts: string[] = [];
  lastSignal: AbortSignal | undefined;

  constructor(
    private readonly handler: CompletionHandler,
    private readonly models: string[] = ['stub-model:latest']
  ) {}

  /**
   * Client that never answers until its signal aborts.
   */
  static hanging(): StubInferenceClient {
    return new StubInferenceClient(
      (_prompt, signal) =>
        new Promise<string>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        })
    );
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    this.lastSignal = signal;
    return this.handler(prompt, signal);
  }

  async listModels(): Promise<string[]> {
    return this.models;
  }
}

export function jsonCompletion(fixedCode: string, explanation = 'Fixed it', reasoning = 'Because'): string {
  return JSON.stringify({ explanation, fixed_code: fixedCode, reasoning });
}
