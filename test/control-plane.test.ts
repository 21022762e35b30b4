/**
 * Control plane tests: formatting, option validation and the CLI commands
 * that work without Docker.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createProgram,
  formatDuration,
  formatExecution,
  formatFailure,
  formatReadiness,
  formatSessionList,
  formatSessionSummary,
  formatTerminalState,
  repairCommandOptionsSchema,
  runCli,
  sessionIdSchema,
  validate,
  validateOrThrow,
} from '../src/control-plane/index.js';
import { SessionStore } from '../src/artifacts/index.js';
import { RepairOrchestrator } from '../src/orchestrator/index.js';
import { PatchGenerator } from '../src/patch/index.js';
import { createCodeArtifact, DEFAULT_RESOURCE_LIMITS, ErrorType, TerminalState } from '../src/types/index.js';
import type { RepairSession } from '../src/types/index.js';
import { FakeSandboxExecutor, failed, simulatePython, traceback } from './fakes.js';

function captureConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

async function repairSession(code: string): Promise<RepairSession> {
  const orchestrator = new RepairOrchestrator({
    executor: new FakeSandboxExecutor(simulatePython),
    generator: new PatchGenerator({ inference: null }),
    limits: { ...DEFAULT_RESOURCE_LIMITS },
  });
  return orchestrator.repair(code, 3);
}

describe('formatter', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should format durations', () => {
    expect(formatDuration(0.5)).toBe('0.50s');
    expect(formatDuration(75)).toBe('1m 15s');
  });

  it('should print terminal states as plain text without color', () => {
    expect(formatTerminalState(TerminalState.EXHAUSTED_ITERATIONS)).toBe('ExhaustedIterations');
  });

  it('should format a failed attempt with its traceback', () => {
    const stackTrace = traceback(1, 'ZeroDivisionError: division by zero');
    const text = formatExecution(
      failed(ErrorType.ZERO_DIVISION, 'division by zero', stackTrace),
      createCodeArtifact('print(1/0)', 0)
    );

    expect(text.split('\n')).toEqual([
      'Attempt 1 (0.01s)',
      '  ✗ ZeroDivisionError: division by zero',
      '    Traceback (most recent call last):',
      '      File "<string>", line 1, in <module>',
      '    ZeroDivisionError: division by zero',
    ]);
  });

  it('should headline a timed-out attempt by its failure kind', () => {
    const text = formatExecution(
      failed(ErrorType.TIMEOUT, 'Execution exceeded 5 seconds. Possible infinite loop detected.'),
      createCodeArtifact('while True:\n    pass', 1)
    );

    expect(text.split('\n')).toEqual([
      'Attempt 2 (0.01s)',
      '  ✗ Timed out: Execution exceeded 5 seconds. Possible infinite loop detected.',
    ]);
  });

  it('should name memory and unknown failures', () => {
    expect(formatFailure(failed(ErrorType.MEMORY, 'Execution exceeded the memory limit'))).toBe(
      'Out of memory: Execution exceeded the memory limit'
    );
    expect(
      formatFailure(failed(ErrorType.UNKNOWN, 'Sandbox infrastructure failure', 'Docker Error: connect ENOENT'))
    ).toBe('Sandbox infrastructure failure');
    expect(formatFailure(failed(ErrorType.UNKNOWN, null))).toBe('Unknown failure');
  });

  it('should summarize a session', async () => {
    const session = await repairSession('while True:\n    pass');

    expect(formatSessionSummary(session).split('\n')).toEqual([
      'Result:      NonRecoverable',
      `Session:     ${session.id}`,
      'Iterations:  1',
      'Patches:     1',
      'Reason:      NonRecoverable: no automatic fix available for TimeoutError',
    ]);
  });

  it('should list readiness checks', () => {
    const text = formatReadiness({
      ready: false,
      timestamp: '2026-01-01T00:00:00.000Z',
      checks: [
        { name: 'sandbox', healthy: false, message: 'Docker daemon is not running or not accessible', latencyMs: 3 },
        { name: 'inference', healthy: true, message: 'Inference disabled; rule-based fixes only', latencyMs: 0 },
      ],
    });

    expect(text.split('\n')).toEqual([
      '✗ sandbox    Docker daemon is not running or not accessible (3ms)',
      '✓ inference  Inference disabled; rule-based fixes only (0ms)',
      '',
      '✗ System not ready',
    ]);
  });

  it('should describe an empty session list', () => {
    expect(formatSessionList([])).toBe('No stored sessions');
  });
});

describe('validators', () => {
  it('should coerce repair options', () => {
    expect(validateOrThrow(repairCommandOptionsSchema, { maxIterations: '4', ai: false })).toEqual({
      maxIterations: 4,
      ai: false,
      json: false,
      save: true,
    });
  });

  it('should reject an out-of-range iteration budget', () => {
    expect(() => validateOrThrow(repairCommandOptionsSchema, { maxIterations: '0' })).toThrow(
      'Validation failed: maxIterations:'
    );
  });

  it('should reject session ids with path separators', () => {
    const result = validate(sessionIdSchema, '../etc');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]?.message).toBe('Session ID may only contain letters, digits, "_" and "-"');
    }
  });
});

describe('CLI', () => {
  let dataDir: string;
  let output: ReturnType<typeof captureConsole>;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'autopatch-cli-'));
    vi.stubEnv('AUTOPATCH_DATA_DIR', dataDir);
    vi.stubEnv('NO_COLOR', '1');
    output = captureConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should register every command', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(['repair', 'status', 'show', 'sessions', 'cleanup']);
  });

  it('should print a stored session as JSON', async () => {
    const session = await repairSession('print(1/0)');
    await new SessionStore(dataDir).save(session);

    await runCli(['node', 'autopatch', 'show', session.id, '--json']);

    const printed: unknown = JSON.parse(String(output.log.mock.calls[0]?.[0]));
    expect(printed).toEqual(JSON.parse(JSON.stringify(session)));
    expect(process.exitCode).toBeUndefined();
  });

  it('should fail for an unknown session', async () => {
    await runCli(['node', 'autopatch', 'show', 'missing-id']);

    expect(output.error).toHaveBeenCalledWith('✗ Session not found: missing-id');
    expect(process.exitCode).toBe(1);
  });

  it('should list stored sessions', async () => {
    const session = await repairSession('print("ok")');
    await new SessionStore(dataDir).save(session);

    await runCli(['node', 'autopatch', 'sessions']);

    expect(String(output.log.mock.calls[0]?.[0])).toMatch(new RegExp(`^${session.id} `));
  });

  it('should prune stored sessions without touching Docker', async () => {
    const session = await repairSession('print("ok")');
    await new SessionStore(dataDir).save(session);

    await runCli(['node', 'autopatch', 'cleanup', '--max-count', '0', '--no-containers']);

    expect(await new SessionStore(dataDir).list()).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });
});
