import { type SemVer, formatSemVer, parseSemVer } from './semver.js';
import { logger } from '../observability/logger.js';

export type BumpStrategy = 'auto';

/** Backing versioning tool, e.g. a conventional-commits CLI. */
export interface VersionTool {
  getVersion(signal?: AbortSignal): Promise<string>;
  /** Creates the bump commit and tag locally; the commit message carries `skipMarker`. */
  bump(auto: boolean, skipMarker: string, signal?: AbortSignal): Promise<void>;
}

export class VersionDetectionError extends Error {
  constructor(
    public readonly rawOutput: string,
    message: string = `Could not parse a semantic version from "${rawOutput.trim()}"`
  ) {
    super(message);
    this.name = 'VersionDetectionError';
  }
}

export class VersionBumpReusedError extends Error {
  constructor() {
    super('bump() may only be invoked once per run');
    this.name = 'VersionBumpReusedError';
  }
}

/** One oracle per run; it refuses a second bump. */
export class VersionOracle {
  private bumped = false;

  constructor(
    private readonly tool: VersionTool,
    private readonly skipMarker: string
  ) {}

  async currentVersion(signal?: AbortSignal): Promise<SemVer> {
    const raw = await this.tool.getVersion(signal);
    const version = parseSemVer(raw);
    if (!version) {
      throw new VersionDetectionError(raw);
    }
    return version;
  }

  async bump(strategy: BumpStrategy = 'auto', signal?: AbortSignal): Promise<SemVer> {
    if (this.bumped) {
      throw new VersionBumpReusedError();
    }
    this.bumped = true;

    await this.tool.bump(strategy === 'auto', this.skipMarker, signal);
    const version = await this.currentVersion(signal);

    logger.info('version_bump', 'Version bump finished', {
      strategy,
      version: formatSemVer(version),
    });
    return version;
  }

  hasBumped(): boolean {
    return this.bumped;
  }
}
