/**
 * State machine for a repair session.
 * Running loops through execute-patch cycles until one of three terminal states.
 */

import { TerminalState } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

export const RepairState = {
  RUNNING: 'Running',
  ...TerminalState,
} as const;

export type RepairState = (typeof RepairState)[keyof typeof RepairState];

export const RepairEvent = {
  EXECUTION_SUCCEEDED: 'execution_succeeded',
  BUDGET_EXHAUSTED: 'budget_exhausted',
  PATCH_APPLIED: 'patch_applied',
  NO_CHANGE: 'no_change',
} as const;

export type RepairEvent = (typeof RepairEvent)[keyof typeof RepairEvent];

/**
 * State transition table.
 * Maps (current state, event) -> next state
 */
const transitions: Record<RepairState, Partial<Record<RepairEvent, RepairState>>> = {
  [RepairState.RUNNING]: {
    [RepairEvent.EXECUTION_SUCCEEDED]: RepairState.SUCCESS,
    [RepairEvent.BUDGET_EXHAUSTED]: RepairState.EXHAUSTED_ITERATIONS,
    [RepairEvent.NO_CHANGE]: RepairState.NON_RECOVERABLE,
    // Running(i) -> Running(i + 1)
    [RepairEvent.PATCH_APPLIED]: RepairState.RUNNING,
  },
  // Terminal states - no transitions out
  [RepairState.SUCCESS]: {},
  [RepairState.EXHAUSTED_ITERATIONS]: {},
  [RepairState.NON_RECOVERABLE]: {},
};

export function isTerminalState(state: RepairState): state is TerminalState {
  return state !== RepairState.RUNNING;
}

/**
 * Get the next state for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextState(current: RepairState, event: RepairEvent): RepairState | null {
  return transitions[current][event] ?? null;
}

/**
 * Apply a transition, throwing on an invalid one.
 */
export function applyTransition(
  sessionId: string,
  current: RepairState,
  event: RepairEvent,
  iteration: number
): RepairState {
  const next = getNextState(current, event);

  if (next === null) {
    const error = `Invalid transition: ${current} + ${event}`;
    log.error({ sessionId, currentState: current, event }, error);
    throw new Error(error);
  }

  log.debug({ sessionId, from: current, event, to: next, iteration }, 'State transition');
  return next;
}
