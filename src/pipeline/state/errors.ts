import type { RunState } from './states.js';

export class IllegalStateTransitionError extends Error {
  constructor(
    public readonly from: RunState,
    public readonly to: RunState,
    public readonly reason: string
  ) {
    super(`Illegal state transition: ${from} → ${to}: ${reason}`);
    this.name = 'IllegalStateTransitionError';
  }
}

export class TerminalStateViolationError extends Error {
  constructor(
    public readonly state: RunState,
    public readonly attemptedTransition: RunState
  ) {
    super(`Cannot transition from terminal state ${state} to ${attemptedTransition}`);
    this.name = 'TerminalStateViolationError';
  }
}
