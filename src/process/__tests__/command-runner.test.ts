import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CommandFailedError, formatCommand, runCommand } from '../command-runner.js';

describe('CommandFailedError', () => {
  it('includes the exit code and the stderr tail', () => {
    const error = new CommandFailedError('make test', 2, 'FAIL src/app.test\n');
    assert.equal(error.message, 'make test exited with code 2: FAIL src/app.test');
  });

  it('names the signal that killed the process', () => {
    const error = new CommandFailedError('docker build .', null, '', 'SIGKILL');
    assert.equal(error.message, 'docker build . was killed by SIGKILL');
  });
});

describe('runCommand', () => {
  it('rejects with the abort reason without spawning when already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('budget exhausted');
    controller.abort(reason);

    await assert.rejects(runCommand('docker', ['build', '.'], { signal: controller.signal }), error => error === reason);
  });

  it('joins the command for display', () => {
    assert.equal(formatCommand('cog', ['bump', '--auto']), 'cog bump --auto');
  });
});
