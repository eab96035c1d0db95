export type RunState =
  | 'INITIALIZED'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED';

export interface StateMetadata {
  state: RunState;
  isTerminal: boolean;
  canTransitionTo: RunState[];
  description: string;
}

const STATE_DEFINITIONS: Record<RunState, Omit<StateMetadata, 'state'>> = {
  INITIALIZED: {
    isTerminal: false,
    canTransitionTo: ['RUNNING', 'FAILED'],
    description: 'Run created, no stage evaluated yet',
  },

  RUNNING: {
    isTerminal: false,
    canTransitionTo: ['SUCCEEDED', 'FAILED'],
    description: 'Stages are being evaluated in order',
  },

  SUCCEEDED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Every stage was skipped or succeeded',
  },

  FAILED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'A stage failed or the time budget ran out',
  },
};

export function getStateMetadata(state: RunState): StateMetadata {
  return {
    state,
    ...STATE_DEFINITIONS[state],
  };
}

export function isTerminalState(state: RunState): boolean {
  return STATE_DEFINITIONS[state].isTerminal;
}

export function canTransition(from: RunState, to: RunState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
