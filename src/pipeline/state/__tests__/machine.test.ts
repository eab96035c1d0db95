import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { RunStateMachine } from '../machine.js';
import { IllegalStateTransitionError, TerminalStateViolationError } from '../errors.js';
import { canTransition, getStateMetadata } from '../states.js';
import { silenceLogs } from '../../../__tests__/helpers/fakes.js';

describe('RunStateMachine', () => {
  before(() => silenceLogs());

  it('moves through the normal path to a terminal state', () => {
    const machine = new RunStateMachine('run-1');
    machine.transition('RUNNING');
    machine.transition('SUCCEEDED');

    assert.equal(machine.getCurrentState(), 'SUCCEEDED');
    assert.equal(machine.isTerminal(), true);
    assert.equal(machine.getFinalState(), 'SUCCEEDED');
    assert.deepEqual(machine.getStateHistorySummary(), ['INITIALIZED→RUNNING', 'RUNNING→SUCCEEDED']);
  });

  it('keeps the transition reason', () => {
    const machine = new RunStateMachine('run-2');
    machine.transition('RUNNING');
    machine.transition('FAILED', 'test failed');

    assert.equal(machine.getTransitionHistory()[1].reason, 'test failed');
  });

  it('rejects skipping RUNNING on success', () => {
    const machine = new RunStateMachine('run-3');
    assert.equal(machine.canTransitionTo('SUCCEEDED'), false);
    assert.throws(() => machine.transition('SUCCEEDED'), IllegalStateTransitionError);
    assert.equal(machine.getCurrentState(), 'INITIALIZED');
  });

  it('never leaves a terminal state', () => {
    const machine = new RunStateMachine('run-4');
    machine.transition('FAILED');
    assert.throws(() => machine.transition('RUNNING'), TerminalStateViolationError);
    assert.equal(machine.getFinalState(), 'FAILED');
  });

  it('has no final state while running', () => {
    const machine = new RunStateMachine('run-5');
    machine.transition('RUNNING');
    assert.equal(machine.getFinalState(), null);
  });
});

describe('state definitions', () => {
  it('describes terminal states without outgoing edges', () => {
    assert.deepEqual(getStateMetadata('SUCCEEDED').canTransitionTo, []);
    assert.equal(canTransition('INITIALIZED', 'FAILED'), true);
    assert.equal(canTransition('RUNNING', 'INITIALIZED'), false);
  });
});
