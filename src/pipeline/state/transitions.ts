import { type RunState, canTransition, isTerminalState } from './states.js';

export interface StateTransition {
  from: RunState;
  to: RunState;
  timestamp: string;
  reason?: string;
}

export type TransitionResult =
  | { allowed: true }
  | { allowed: false; reason: string };

export function validateTransition(from: RunState, to: RunState): TransitionResult {
  if (isTerminalState(from)) {
    return {
      allowed: false,
      reason: `Cannot transition from terminal state ${from}`,
    };
  }

  if (!canTransition(from, to)) {
    return {
      allowed: false,
      reason: `Invalid transition from ${from} to ${to}`,
    };
  }

  return { allowed: true };
}

export function createTransition(from: RunState, to: RunState, reason?: string): StateTransition {
  return {
    from,
    to,
    timestamp: new Date().toISOString(),
    reason,
  };
}
