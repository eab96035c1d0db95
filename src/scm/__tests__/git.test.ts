import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GitSourceControl } from '../git.js';
import { commitContextFromEnv } from '../context.js';
import { fakeRunner } from '../../__tests__/helpers/fakes.js';

describe('GitSourceControl', () => {
  it('fetches tags and checks the commit out on a local branch', async () => {
    const runner = fakeRunner();
    await new GitSourceControl('/work', runner).checkout('main', 'abc123');

    assert.deepEqual(runner.calls, ['git fetch --tags origin', 'git checkout --force -B main abc123']);
  });

  it('pushes the release commit with its tag', async () => {
    const runner = fakeRunner();
    await new GitSourceControl('/work', runner, 'upstream').pushRelease('main');

    assert.deepEqual(runner.calls, ['git push upstream HEAD:main --follow-tags']);
  });

  it('reads a trimmed commit message', async () => {
    const runner = fakeRunner({}, 'feat: add release notes\n\n');
    assert.equal(await new GitSourceControl('/work', runner).readCommitMessage('abc123'), 'feat: add release notes');
  });
});

describe('commitContextFromEnv', () => {
  it('reads a jenkins environment', () => {
    assert.deepEqual(
      commitContextFromEnv({ GIT_BRANCH: 'origin/main', GIT_COMMIT: 'abc123', GIT_COMMIT_MESSAGE: 'fix: typo' }),
      {
        branchName: 'main',
        commitHash: 'abc123',
        commitMessage: 'fix: typo',
        owner: undefined,
        repo: undefined,
        installationId: undefined,
      }
    );
  });

  it('reads a github actions environment', () => {
    const context = commitContextFromEnv({
      GITHUB_REF_NAME: 'main',
      GITHUB_SHA: 'def456',
      GITHUB_REPOSITORY: 'example-org/example-service',
      GITHUB_INSTALLATION_ID: '42',
    });

    assert.equal(context.branchName, 'main');
    assert.equal(context.commitHash, 'def456');
    assert.equal(context.owner, 'example-org');
    assert.equal(context.repo, 'example-service');
    assert.equal(context.installationId, 42);
  });
});
