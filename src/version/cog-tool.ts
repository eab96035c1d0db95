import type { VersionTool } from './oracle.js';
import { type CommandRunner, CommandFailedError, runCommand } from '../process/command-runner.js';
import { logger } from '../observability/logger.js';

const NOTHING_TO_BUMP = /no (conventional )?commits? (found|to bump)|nothing to bump|no version bump/i;

/** Version tool backed by the cocogitto CLI (`cog`). */
export class CogVersionTool implements VersionTool {
  constructor(
    private readonly workDir: string,
    private readonly run: CommandRunner = runCommand,
    private readonly binary: string = 'cog'
  ) {}

  async getVersion(signal?: AbortSignal): Promise<string> {
    // Verbose output goes to stderr; the version is the last stdout line.
    const result = await this.run(this.binary, ['-v', 'get-version'], { cwd: this.workDir, signal });
    const lines = result.stdout.split('\n').map(line => line.trim()).filter(Boolean);
    return lines[lines.length - 1] ?? '';
  }

  async bump(auto: boolean, skipMarker: string, signal?: AbortSignal): Promise<void> {
    const args = ['bump', auto ? '--auto' : '--patch', '--skip-ci-override', skipMarker];

    try {
      await this.run(this.binary, args, { cwd: this.workDir, signal });
    } catch (error) {
      if (error instanceof CommandFailedError && NOTHING_TO_BUMP.test(error.stderr)) {
        logger.info('version_bump', 'No commits warrant a version bump', { stderr: error.stderr.trim() });
        return;
      }
      throw error;
    }
  }
}
