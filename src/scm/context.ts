import type { CommitContext } from '../types.js';

/**
 * Commit details from the CI environment. Jenkins, GitHub Actions and a
 * plain `BRANCH_NAME`/`GIT_COMMIT` pair are recognised.
 */
export function commitContextFromEnv(env: NodeJS.ProcessEnv): Partial<CommitContext> {
  const branchName =
    env.BRANCH_NAME ||
    env.GITHUB_REF_NAME ||
    (env.GIT_BRANCH ? env.GIT_BRANCH.replace(/^origin\//, '') : undefined);
  const commitHash = env.GIT_COMMIT || env.GITHUB_SHA;

  const [owner, repo] = (env.GITHUB_REPOSITORY ?? '').split('/');
  const installationId = env.GITHUB_INSTALLATION_ID ? parseInt(env.GITHUB_INSTALLATION_ID, 10) : NaN;

  return {
    branchName: branchName || undefined,
    commitHash: commitHash || undefined,
    commitMessage: env.GIT_COMMIT_MESSAGE,
    owner: owner || undefined,
    repo: repo || undefined,
    installationId: Number.isNaN(installationId) ? undefined : installationId,
  };
}
