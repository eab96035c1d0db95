import type { GuardPredicate, Stage, StageAction } from './types.js';
import type { PipelineRun } from './run.js';
import { StageActionError } from './errors.js';
import type { ImageRef, PipelineConfig, RegistryTarget } from '../types.js';
import type { VersionOracle } from '../version/oracle.js';
import { formatSemVer } from '../version/semver.js';
import type { SourceControl } from '../scm/git.js';
import type { ContainerTool } from '../container/docker-tool.js';
import type { ReleaseTracker } from '../tracker/client.js';
import { type CommandRunner, formatCommand } from '../process/command-runner.js';
import { commitBuiltEvent, newVersionEvent } from '../notifications/formatter.js';
import { errorMessage } from '../observability/logger.js';

export const STAGE_NAMES = {
  checkout: 'checkout',
  test: 'test',
  bumpVersion: 'bump-version',
  buildImage: 'build-image',
  pushImages: 'push-images',
  pushReleaseTag: 'push-release-tag',
  registerRelease: 'register-release',
} as const;

export function pushStageName(target: RegistryTarget): string {
  return `push-${target.environment}-${target.region}`;
}

const RELEASE_GUARD: GuardPredicate[] = ['notSkipped', 'onTargetBranch', 'versionChanged'];

export interface StageCollaborators {
  sourceControl: SourceControl;
  versionOracle: VersionOracle;
  container: ContainerTool;
  tracker: ReleaseTracker | null;
  runCommand: CommandRunner;
}

function stage(name: string, guard: GuardPredicate[], action: StageAction): Stage {
  return { name, guard, action, whenFailed: 'abort-run' };
}

function requireNewVersion(run: PipelineRun, stageName: string): string {
  if (!run.newVersion) {
    throw new StageActionError(stageName, 'No bumped version available');
  }
  return formatSemVer(run.newVersion);
}

function requireImage(run: PipelineRun, stageName: string): ImageRef {
  if (!run.imageRef) {
    throw new StageActionError(stageName, 'No built image available');
  }
  return run.imageRef;
}

/**
 * The fixed stage list, in execution order. With `pushParallel` the
 * per-registry pushes collapse into one stage that pushes concurrently and
 * fails if any single push fails.
 */
export function buildStages(config: PipelineConfig, deps: StageCollaborators): Stage[] {
  const { sourceControl, versionOracle, container, tracker, runCommand } = deps;

  const stages: Stage[] = [
    stage(STAGE_NAMES.checkout, [], async ({ run, signal }) => {
      await sourceControl.checkout(run.branchName, run.commitHash, signal);
      return `Checked out ${run.commitHash}`;
    }),

    stage(STAGE_NAMES.test, ['notSkipped'], async ({ signal }) => {
      for (const [command, ...args] of config.testCommands) {
        await runCommand(command, args, { cwd: config.workDir, signal });
      }
      return `Ran ${config.testCommands.map(argv => formatCommand(argv[0], argv.slice(1))).join(', ')}`;
    }),

    stage(STAGE_NAMES.bumpVersion, ['notSkipped', 'onTargetBranch'], async ({ run, signal }) => {
      run.oldVersion = await versionOracle.currentVersion(signal);
      run.newVersion = await versionOracle.bump('auto', signal);

      const from = formatSemVer(run.oldVersion);
      const to = formatSemVer(run.newVersion);
      return from === to ? `Version unchanged at ${from}` : `Version bumped ${from} → ${to}`;
    }),

    stage(STAGE_NAMES.buildImage, RELEASE_GUARD, async ({ run, signal, notifications }) => {
      const version = requireNewVersion(run, STAGE_NAMES.buildImage);
      run.imageRef = await container.build(version, run.commitHash, signal);

      notifications.record(commitBuiltEvent(run.commitHash));
      notifications.record(newVersionEvent(version));
      return `Built ${run.imageRef.name}:${run.imageRef.tag}`;
    }),
  ];

  if (config.pushParallel) {
    stages.push(
      stage(STAGE_NAMES.pushImages, RELEASE_GUARD, async ({ run, signal }) => {
        const image = requireImage(run, STAGE_NAMES.pushImages);
        const results = await Promise.allSettled(
          config.registries.map(target => container.push(image, target.host, signal))
        );

        const failures = results.flatMap((result, index) =>
          result.status === 'rejected' ? [`${pushStageName(config.registries[index])}: ${errorMessage(result.reason)}`] : []
        );
        if (failures.length > 0) {
          throw new StageActionError(STAGE_NAMES.pushImages, `Push failed for ${failures.join('; ')}`);
        }
        return `Pushed to ${config.registries.length} registries`;
      })
    );
  } else {
    for (const target of config.registries) {
      stages.push(
        stage(pushStageName(target), RELEASE_GUARD, async ({ run, signal }) => {
          const image = requireImage(run, pushStageName(target));
          await container.push(image, target.host, signal);
          return `Pushed to ${target.host}`;
        })
      );
    }
  }

  stages.push(
    stage(STAGE_NAMES.pushReleaseTag, RELEASE_GUARD, async ({ run, signal }) => {
      await sourceControl.pushRelease(run.branchName, signal);
      return `Pushed release commit and tag to ${run.branchName}`;
    }),

    stage(STAGE_NAMES.registerRelease, RELEASE_GUARD, async ({ run, signal }) => {
      const version = requireNewVersion(run, STAGE_NAMES.registerRelease);
      if (!tracker) {
        return 'Rollout tracker not configured, registration skipped';
      }

      await tracker.registerRelease(
        {
          version,
          dockerTag: requireImage(run, STAGE_NAMES.registerRelease).tag,
          description: `Release ${version} of commit ${run.commitHash}\n\n${run.commitMessage}`.trim(),
        },
        signal
      );
      return `Registered ${version} with the rollout tracker`;
    })
  );

  return stages;
}
