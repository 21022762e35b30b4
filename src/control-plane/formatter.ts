import { describeExecutionFailure } from '../types/index.js';
import type {
  CodeArtifact,
  ExecutionResult,
  FailedExecution,
  PatchRecord,
  RepairSession,
  TerminalState,
} from '../types/index.js';
import type { StoredSessionInfo } from '../artifacts/index.js';
import type { ReadinessResponse } from '../status/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a terminal state with appropriate color.
 */
export function formatTerminalState(state: TerminalState): string {
  const stateColors: Record<TerminalState, keyof typeof colors> = {
    Success: 'green',
    ExhaustedIterations: 'yellow',
    NonRecoverable: 'red',
  };
  return colorize(state, stateColors[state]);
}

/**
 * Format a duration in seconds, keeping sub-second precision for short runs.
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const whole = Math.round(seconds);
  const minutes = Math.floor(whole / 60);
  return `${minutes}m ${whole % 60}s`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

/**
 * Indent every line of a block.
 */
function indent(text: string, prefix = '  '): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

/**
 * Color unified diff lines by marker.
 */
export function formatDiff(diff: string): string {
  return diff
    .trimEnd()
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return bold(line);
      if (line.startsWith('@@')) return cyan(line);
      if (line.startsWith('+')) return green(line);
      if (line.startsWith('-')) return red(line);
      return line;
    })
    .join('\n');
}

/**
 * Headline for a failed run, by failure kind.
 */
export function formatFailure(result: FailedExecution): string {
  const detail = result.errorMessage ? `: ${result.errorMessage}` : '';
  const failure = describeExecutionFailure(result);

  switch (failure.kind) {
    case 'Timeout':
      return `${red('Timed out')}${detail}`;
    case 'MemoryExceeded':
      return `${red('Out of memory')}${detail}`;
    case 'UnknownFailure':
      return red(result.errorMessage ?? 'Unknown failure');
    case 'RuntimeError':
      return `${red(failure.errorType)}${detail}`;
  }
}

/**
 * One sandbox run, as printed while a repair is in progress.
 */
export function formatExecution(result: ExecutionResult, code: CodeArtifact): string {
  const header = `${bold(`Attempt ${code.iteration + 1}`)} ${dim(`(${formatDuration(result.durationSeconds)})`)}`;

  if (result.success) {
    const lines = [header, `  ${green('✓')} Program ran successfully`];
    if (result.stdout.trim().length > 0) {
      lines.push(dim('  Output:'), indent(result.stdout.trimEnd(), '    '));
    }
    return lines.join('\n');
  }

  const lines = [header, `  ${red('✗')} ${formatFailure(result)}`];
  if (result.stackTrace) {
    lines.push(dim(indent(result.stackTrace.trimEnd(), '    ')));
  }
  return lines.join('\n');
}

/**
 * One patch record, as printed while a repair is in progress.
 */
export function formatPatch(patch: PatchRecord): string {
  const origin =
    patch.source === 'ai' ? 'AI' : `rule-based fallback${patch.fallbackCause ? `, ${patch.fallbackCause}` : ''}`;
  const lines = [
    `  ${blue('Patch')} ${dim(`(${origin}, ${formatDuration(patch.generationTimeSeconds)})`)}`,
    `  ${patch.explanation}`,
  ];

  if (patch.noChange) {
    lines.push(`  ${yellow('!')} ${yellow('No change recommended')}`);
  } else if (patch.unifiedDiff.length > 0) {
    lines.push(indent(formatDiff(patch.unifiedDiff), '    '));
  }
  return lines.join('\n');
}

/**
 * Closing summary of a repair session.
 */
export function formatSessionSummary(session: RepairSession): string {
  const lines = [
    `${bold('Result:')}      ${formatTerminalState(session.terminalState)}`,
    `${bold('Session:')}     ${session.id}`,
    `${bold('Iterations:')}  ${session.totalIterations}`,
    `${bold('Patches:')}     ${session.patches.length}`,
  ];
  if (session.failureReason) {
    lines.push(`${bold('Reason:')}      ${session.failureReason}`);
  }
  return lines.join('\n');
}

/**
 * Full stored session, for the show command.
 */
export function formatSessionDetail(session: RepairSession, includeCode: boolean): string {
  const lines = [
    formatSessionSummary(session),
    `${bold('Started:')}     ${session.startedAt}`,
    `${bold('Completed:')}   ${session.completedAt}`,
    '',
  ];

  session.executions.forEach((result, index) => {
    lines.push(formatExecution(result, { source: '', iteration: index }));
    const patch = session.patches.find((candidate) => candidate.iteration === index);
    if (patch) {
      lines.push(formatPatch(patch));
    }
  });

  if (includeCode) {
    lines.push('', bold('Final code:'), session.finalCode);
  }
  return lines.join('\n');
}

/**
 * Readiness checks as a list.
 */
export function formatReadiness(status: ReadinessResponse): string {
  const lines = status.checks.map((check) => {
    const marker = check.healthy ? green('✓') : red('✗');
    return `${marker} ${padRight(check.name, 10)} ${check.message} ${dim(`(${check.latencyMs}ms)`)}`;
  });
  lines.push('', status.ready ? formatSuccess('System ready') : formatError('System not ready'));
  return lines.join('\n');
}

export function formatSessionList(sessions: StoredSessionInfo[]): string {
  if (sessions.length === 0) {
    return dim('No stored sessions');
  }
  return sessions
    .map((session) => `${padRight(session.id, 14)} ${dim(session.modifiedAt.toISOString())}`)
    .join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
