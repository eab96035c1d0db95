import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { StageRunner } from '../stage-runner.js';
import { PipelineRun } from '../run.js';
import { PipelineTimeoutError } from '../errors.js';
import type { Stage, StageAction, StageContext } from '../types.js';
import { NotificationAggregator } from '../../notifications/aggregator.js';
import { commit, silenceLogs } from '../../__tests__/helpers/fakes.js';

function stage(action: StageAction): Stage {
  return { name: 'build-image', guard: [], action, whenFailed: 'abort-run' };
}

function context(signal: AbortSignal = new AbortController().signal): StageContext {
  return {
    run: new PipelineRun(commit(), '[skip ci]', 'run-1'),
    signal,
    notifications: new NotificationAggregator({
      chat: null,
      channel: 'releases',
      serviceName: 'example-service',
      targetBranch: 'main',
    }),
  };
}

describe('StageRunner', () => {
  const runner = new StageRunner();

  before(() => silenceLogs());

  it('reports the action summary on success', async () => {
    const outcome = await runner.run(stage(async () => 'Built example-service:1.3.0'), context());
    assert.equal(outcome.ok, true);
    assert.equal(outcome.message, 'Built example-service:1.3.0');
  });

  it('falls back to a default summary', async () => {
    const outcome = await runner.run(stage(async () => {}), context());
    assert.equal(outcome.message, 'build-image succeeded');
  });

  it('folds a rejected action into a failed outcome', async () => {
    const outcome = await runner.run(
      stage(async () => {
        throw new Error('daemon not running');
      }),
      context()
    );
    assert.equal(outcome.ok, false);
    assert.equal(outcome.message, 'daemon not running');
  });

  it('does not start an action once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new PipelineTimeoutError(60_000, 'test'));
    let started = false;

    const outcome = await runner.run(
      stage(async () => {
        started = true;
      }),
      context(controller.signal)
    );

    assert.equal(started, false);
    assert.deepEqual(outcome, {
      ok: false,
      message: 'Pipeline exceeded its time budget of 60s during stage test',
      durationMs: 0,
    });
  });

  it('settles on abort even if the action ignores the signal', async () => {
    const controller = new AbortController();
    const pending = runner.run(
      stage(() => new Promise<void>(() => {})),
      context(controller.signal)
    );
    controller.abort(new PipelineTimeoutError(2_000, 'build-image'));

    const outcome = await pending;
    assert.equal(outcome.ok, false);
    assert.equal(outcome.message, 'Pipeline exceeded its time budget of 2s during stage build-image');
  });
});
