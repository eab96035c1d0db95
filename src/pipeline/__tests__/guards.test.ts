import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { GuardEvaluator, type GuardSubject } from '../guards.js';
import type { GuardPredicate } from '../types.js';
import { parseSemVer, type SemVer } from '../../version/semver.js';
import { silenceLogs } from '../../__tests__/helpers/fakes.js';

function version(input: string): SemVer | null {
  return parseSemVer(input);
}

function subject(overrides: Partial<GuardSubject> = {}): GuardSubject {
  return {
    skipCI: false,
    branchName: 'main',
    oldVersion: version('1.2.0'),
    newVersion: version('1.3.0'),
    ...overrides,
  };
}

const RELEASE: GuardPredicate[] = ['notSkipped', 'onTargetBranch', 'versionChanged'];

describe('GuardEvaluator', () => {
  const guards = new GuardEvaluator('main');

  before(() => silenceLogs());

  it('always runs a stage without predicates', () => {
    assert.equal(guards.shouldRun({ name: 'checkout', guard: [] }, subject({ skipCI: true, branchName: 'dev' })), true);
  });

  it('requires every predicate to hold', () => {
    assert.equal(guards.shouldRun({ name: 'build-image', guard: RELEASE }, subject()), true);
    assert.equal(guards.shouldRun({ name: 'build-image', guard: RELEASE }, subject({ skipCI: true })), false);
    assert.equal(guards.shouldRun({ name: 'build-image', guard: RELEASE }, subject({ branchName: 'feature/x' })), false);
    assert.equal(
      guards.shouldRun({ name: 'build-image', guard: RELEASE }, subject({ newVersion: version('1.2.0') })),
      false
    );
  });

  it('treats an unknown version as unchanged', () => {
    assert.equal(guards.shouldRun({ name: 'build-image', guard: ['versionChanged'] }, subject({ oldVersion: null })), false);
    assert.equal(guards.shouldRun({ name: 'build-image', guard: ['versionChanged'] }, subject({ newVersion: null })), false);
  });

  it('compares branches exactly', () => {
    assert.equal(guards.shouldRun({ name: 'bump-version', guard: ['onTargetBranch'] }, subject({ branchName: 'Main' })), false);
  });

  it('resolves to false when a predicate throws', () => {
    const broken: GuardSubject = {
      skipCI: false,
      branchName: 'main',
      get oldVersion(): SemVer | null {
        throw new Error('version not readable');
      },
      newVersion: null,
    };
    assert.equal(guards.shouldRun({ name: 'build-image', guard: ['versionChanged'] }, broken), false);
  });
});
