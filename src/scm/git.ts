import { type CommandRunner, runCommand } from '../process/command-runner.js';

export interface SourceControl {
  checkout(branchName: string, commitHash: string, signal?: AbortSignal): Promise<void>;
  /** Pushes the bump commit and its tag created by the version tool. */
  pushRelease(branchName: string, signal?: AbortSignal): Promise<void>;
}

export class GitSourceControl implements SourceControl {
  constructor(
    private readonly workDir: string,
    private readonly run: CommandRunner = runCommand,
    private readonly remote: string = 'origin'
  ) {}

  async checkout(branchName: string, commitHash: string, signal?: AbortSignal): Promise<void> {
    await this.git(['fetch', '--tags', this.remote], signal);
    // A local branch at the commit keeps the bump commit on a named ref.
    await this.git(['checkout', '--force', '-B', branchName, commitHash], signal);
  }

  async pushRelease(branchName: string, signal?: AbortSignal): Promise<void> {
    await this.git(['push', this.remote, `HEAD:${branchName}`, '--follow-tags'], signal);
  }

  async readCommitMessage(commitHash: string, signal?: AbortSignal): Promise<string> {
    const result = await this.git(['log', '-1', '--format=%B', commitHash], signal);
    return result.stdout.trim();
  }

  private git(args: string[], signal?: AbortSignal) {
    return this.run('git', args, { cwd: this.workDir, signal });
  }
}
