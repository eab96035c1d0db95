import { PipelineRun, type StageOutcomeKind, versionChanged } from './run.js';
import { GuardEvaluator } from './guards.js';
import { StageRunner } from './stage-runner.js';
import { buildStages } from './stages.js';
import { type FailureCause, PipelineTimeoutError } from './errors.js';
import type { Stage } from './types.js';
import type { CommitContext, PipelineConfig } from '../types.js';
import { VersionOracle, type VersionTool } from '../version/oracle.js';
import { formatSemVer } from '../version/semver.js';
import type { SourceControl } from '../scm/git.js';
import type { ContainerTool } from '../container/docker-tool.js';
import type { ReleaseTracker } from '../tracker/client.js';
import { type CommandRunner, runCommand } from '../process/command-runner.js';
import { NotificationAggregator } from '../notifications/aggregator.js';
import type { ChatClient, FlushResult } from '../notifications/types.js';
import type { CommitState, StatusPublisher } from '../output/publisher.js';
import type { RunHistory, RunRecord } from '../runs/types.js';
import { logger, errorMessage, generateRunId } from '../observability/logger.js';
import { metrics } from '../metrics/metrics.js';
import { type InMemorySemaphore, workDirSemaphore } from '../concurrency/semaphore.js';

export interface ExecutorDependencies {
  sourceControl: SourceControl;
  versionTool: VersionTool;
  container: ContainerTool;
  tracker: ReleaseTracker | null;
  chat: ChatClient | null;
  runCommand?: CommandRunner;
  statusPublisher?: StatusPublisher | null;
  history?: RunHistory | null;
  /** Serialises runs; defaults to the shared lock of `config.workDir`. */
  runLock?: InMemorySemaphore;
}

export interface RunReport {
  run: PipelineRun;
  record: RunRecord;
  notification: FlushResult;
}

export class PipelineExecutor {
  private readonly guards: GuardEvaluator;
  private readonly runner = new StageRunner();

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: ExecutorDependencies
  ) {
    this.guards = new GuardEvaluator(config.targetBranch);
  }

  get runLock(): InMemorySemaphore {
    return this.deps.runLock ?? workDirSemaphore(this.config.workDir);
  }

  /**
   * Runs one pipeline. Runs sharing a working directory queue behind each
   * other; the time budget starts once the run holds the lock.
   */
  execute(context: CommitContext, runId?: string): Promise<RunReport> {
    const id = runId ?? generateRunId();

    return logger.withContext({ runId: id, branch: context.branchName, commit: context.commitHash }, async () => {
      const lock = this.runLock;
      const { inFlight, waiting } = lock.getStats();
      const queuedBehind = inFlight + waiting;
      if (queuedBehind > 0) {
        logger.info('pipeline_queued', 'Waiting for the working directory', {
          workDir: this.config.workDir,
          queuedBehind,
        });
      }

      return lock.runExclusive(() => this.executeLocked(new PipelineRun(context, this.config.skipMarker, id)));
    });
  }

  private async executeLocked(run: PipelineRun): Promise<RunReport> {
    const notifications = new NotificationAggregator({
      chat: this.deps.chat,
      channel: this.config.slack?.channel ?? '',
      serviceName: this.config.serviceName,
      targetBranch: this.config.targetBranch,
    });

    metrics.recordRunStarted();

    logger.info('pipeline_start', 'Starting release pipeline', {
      skipCI: run.skipCI,
      targetBranch: this.config.targetBranch,
      timeoutMs: this.config.timeoutMs,
    });

    // A fresh oracle per run keeps the single-bump rule per run.
    const stages = buildStages(this.config, {
      sourceControl: this.deps.sourceControl,
      versionOracle: new VersionOracle(this.deps.versionTool, this.config.skipMarker),
      container: this.deps.container,
      tracker: this.deps.tracker,
      runCommand: this.deps.runCommand ?? runCommand,
    });

    await this.publishStatus(run, 'pending', 'Release pipeline running');

    try {
      await this.runStages(run, stages, notifications);
    } catch (error) {
      // Only reachable through a bug in the executor itself; the run still ends.
      logger.error('pipeline_fatal', 'Unexpected executor error', { error: errorMessage(error) });
      if (!run.stateMachine.isTerminal()) {
        run.failure = { cause: 'stage_error', message: errorMessage(error) };
        run.stateMachine.transition('FAILED', run.failure.message);
      }
    }

    return this.finish(run, notifications);
  }

  private async runStages(run: PipelineRun, stages: Stage[], notifications: NotificationAggregator): Promise<void> {
    const controller = new AbortController();
    let currentStage: string | undefined;
    const timer = setTimeout(() => {
      controller.abort(new PipelineTimeoutError(this.config.timeoutMs, currentStage));
    }, this.config.timeoutMs);

    run.stateMachine.transition('RUNNING');

    try {
      for (const stage of stages) {
        if (controller.signal.aborted) {
          this.fail(run, stage.name, 'timeout', errorMessage(controller.signal.reason));
          return;
        }

        if (!this.guards.shouldRun(stage, run)) {
          this.recordStage(run, stage.name, 'skipped', 0);
          logger.info('stage_skipped', `Guard not satisfied, skipping ${stage.name}`, {
            stage: stage.name,
            guard: stage.guard,
          });
          continue;
        }

        currentStage = stage.name;
        const outcome = await this.runner.run(stage, { run, signal: controller.signal, notifications });

        if (!outcome.ok) {
          this.recordStage(run, stage.name, 'failed', outcome.durationMs, outcome.message);
          const cause: FailureCause = controller.signal.reason instanceof PipelineTimeoutError ? 'timeout' : 'stage_error';
          this.fail(run, stage.name, cause, outcome.message);
          return;
        }

        this.recordStage(run, stage.name, 'succeeded', outcome.durationMs, outcome.message);
      }

      run.stateMachine.transition('SUCCEEDED');
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(run: PipelineRun, stage: string, cause: FailureCause, message: string): void {
    run.failure = { stage, cause, message };
    run.stateMachine.transition('FAILED', cause === 'timeout' ? `timeout during ${stage}` : `${stage} failed`);
  }

  private recordStage(
    run: PipelineRun,
    stage: string,
    outcome: StageOutcomeKind,
    durationMs: number,
    message?: string
  ): void {
    run.recordStage({ stage, outcome, durationMs, message });
    metrics.recordStage(outcome);
  }

  private async finish(run: PipelineRun, notifications: NotificationAggregator): Promise<RunReport> {
    const notification = await notifications.flush(run);

    const succeeded = run.status === 'Succeeded';
    await this.publishStatus(
      run,
      succeeded ? 'success' : 'failure',
      succeeded ? releaseSummary(run) : `Failed at ${run.failure?.stage ?? 'unknown stage'}`
    );

    const finishedAt = new Date();
    const record: RunRecord = {
      runId: run.runId,
      startedAt: run.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - run.startedAt.getTime(),
      branch: run.branchName,
      commitHash: run.commitHash,
      skipCI: run.skipCI,
      status: succeeded ? 'Succeeded' : 'Failed',
      oldVersion: run.oldVersion ? formatSemVer(run.oldVersion) : null,
      newVersion: run.newVersion ? formatSemVer(run.newVersion) : null,
      versionChanged: versionChanged(run),
      failure: run.failure,
      stages: run.stageResults,
      notification: notification.status,
      stateHistory: run.stateMachine.getStateHistorySummary(),
    };

    metrics.recordRunFinished(run.status, run.failure?.cause, succeeded && record.versionChanged);

    if (this.deps.history) {
      try {
        await this.deps.history.append(record);
      } catch (error) {
        logger.error('run_history_error', 'Failed to record run', { error: errorMessage(error) });
      }
    }

    logger.info('pipeline_complete', 'Release pipeline finished', {
      status: record.status,
      oldVersion: record.oldVersion,
      newVersion: record.newVersion,
      failure: record.failure,
      notification: notification.status,
      durationMs: record.durationMs,
      stateTransitions: record.stateHistory,
    });

    return { run, record, notification };
  }

  private async publishStatus(run: PipelineRun, state: CommitState, description: string): Promise<void> {
    const publisher = this.deps.statusPublisher;
    if (!publisher) return;

    try {
      await publisher.publish(run.context, state, description);
    } catch (error) {
      logger.warn('commit_status', 'Failed to publish commit status', {
        state,
        error: errorMessage(error),
      });
    }
  }
}

function releaseSummary(run: PipelineRun): string {
  if (!versionChanged(run) || !run.newVersion) return 'Pipeline succeeded, no release';
  return `Released ${formatSemVer(run.newVersion)}`;
}
