/**
 * Repair prompt construction.
 */

import type { CodeArtifact, FailedExecution, ResourceLimits } from '../types/index.js';

export interface RepairPrompt {
  system: string;
  user: string;
  /** System and user parts joined for single-prompt backends */
  text: string;
}

function formatLimits(limits: ResourceLimits): string[] {
  const memoryMB = Math.round(limits.memoryBytes / (1024 * 1024));
  return [
    `- Memory is capped at ${memoryMB} MB.`,
    `- CPU is throttled to ${limits.cpuShare} of one core.`,
    `- The program is killed after ${limits.timeoutSeconds} seconds.`,
  ];
}

/**
 * Build the prompt asking the model for a corrected program as JSON.
 */
export function buildRepairPrompt(
  code: CodeArtifact,
  result: FailedExecution,
  limits: ResourceLimits
): RepairPrompt {
  const networkRule = limits.networkEnabled
    ? '1. Network access is available but must not be relied on.'
    : '1. The environment has NO network access.';

  const system = [
    'You are an expert Python debugging assistant. The program runs in a restricted, isolated container.',
    '',
    'Rules:',
    networkRule,
    '2. New packages cannot be installed (pip is unavailable).',
    '3. Third-party libraries such as numpy or pandas are not available.',
    '4. Fix the code using ONLY the Python standard library.',
    '5. Return the complete program, not a fragment.',
    '',
    'Runtime limits:',
    ...formatLimits(limits),
    '',
    'Respond with ONLY a JSON object of this shape:',
    '{',
    '  "explanation": "One sentence describing the bug and the fix",',
    '  "fixed_code": "The complete corrected program",',
    '  "reasoning": "Step-by-step analysis"',
    '}',
  ].join('\n');

  const errorDetails = result.stackTrace ?? result.errorMessage ?? '(no traceback captured)';
  const user = [
    `ERROR TYPE: ${result.errorType}`,
    '',
    'CODE:',
    code.source,
    '',
    'ERROR:',
    errorDetails,
    '',
    'Return ONLY the JSON object.',
  ].join('\n');

  return { system, user, text: `${system}\n\n${user}` };
}
