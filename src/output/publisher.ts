import type { Octokit } from '@octokit/rest';
import type { CommitContext } from '../types.js';
import { type GitHubAppCredentials, createInstallationClient } from '../github/client.js';

export type CommitState = 'pending' | 'success' | 'failure';

export const STATUS_CONTEXT = 'release-conductor';

/** Reports run progress on the built commit. */
export interface StatusPublisher {
  publish(context: CommitContext, state: CommitState, description: string): Promise<void>;
}

export type OctokitFactory = (installationId: number) => Promise<Octokit>;

export class GitHubStatusPublisher implements StatusPublisher {
  constructor(private readonly createClient: OctokitFactory) {}

  static fromCredentials(credentials: GitHubAppCredentials): GitHubStatusPublisher {
    return new GitHubStatusPublisher(installationId => createInstallationClient(credentials, installationId));
  }

  async publish(context: CommitContext, state: CommitState, description: string): Promise<void> {
    if (!context.owner || !context.repo || context.installationId === undefined) {
      return;
    }

    // Installation tokens expire after an hour, so each status gets a fresh client.
    const octokit = await this.createClient(context.installationId);
    await octokit.repos.createCommitStatus({
      owner: context.owner,
      repo: context.repo,
      sha: context.commitHash,
      state,
      context: STATUS_CONTEXT,
      // GitHub rejects descriptions over 140 characters.
      description: description.slice(0, 140),
    });
  }
}
