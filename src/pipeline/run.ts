import { RunStateMachine } from './state/machine.js';
import type { RunState } from './state/states.js';
import type { FailureCause } from './errors.js';
import type { CommitContext, ImageRef } from '../types.js';
import { type SemVer, semVerEquals } from '../version/semver.js';
import { generateRunId } from '../observability/logger.js';

export type RunStatus = 'Running' | 'Succeeded' | 'Failed';

export type StageOutcomeKind = 'skipped' | 'succeeded' | 'failed';

export interface StageResult {
  stage: string;
  outcome: StageOutcomeKind;
  durationMs: number;
  message?: string;
}

export interface RunFailure {
  stage?: string;
  cause: FailureCause;
  message: string;
}

/**
 * Mutable record threaded through every stage of one run. Only the
 * executor writes `status` (through the state machine); stages write the
 * version, image and commit fields they own.
 */
export class PipelineRun {
  readonly runId: string;
  readonly branchName: string;
  readonly commitHash: string;
  readonly commitMessage: string;
  readonly skipCI: boolean;
  readonly context: CommitContext;
  readonly startedAt: Date;

  oldVersion: SemVer | null = null;
  newVersion: SemVer | null = null;
  imageRef: ImageRef | null = null;
  failure: RunFailure | null = null;

  private readonly machine: RunStateMachine;
  private readonly results: StageResult[] = [];

  constructor(context: CommitContext, skipMarker: string, runId: string = generateRunId()) {
    this.runId = runId;
    this.context = context;
    this.branchName = context.branchName;
    this.commitHash = context.commitHash;
    this.commitMessage = context.commitMessage;
    this.skipCI = requestsSkip(context.commitMessage, skipMarker);
    this.startedAt = new Date();
    this.machine = new RunStateMachine(runId);
  }

  get state(): RunState {
    return this.machine.getCurrentState();
  }

  get status(): RunStatus {
    switch (this.machine.getCurrentState()) {
      case 'SUCCEEDED':
        return 'Succeeded';
      case 'FAILED':
        return 'Failed';
      default:
        return 'Running';
    }
  }

  get stateMachine(): RunStateMachine {
    return this.machine;
  }

  get stageResults(): StageResult[] {
    return [...this.results];
  }

  recordStage(result: StageResult): void {
    this.results.push(result);
  }
}

const SKIP_MARKERS = ['[skip ci]', '[ci skip]'];

export function requestsSkip(commitMessage: string, skipMarker: string): boolean {
  const message = commitMessage.toLowerCase();
  return [skipMarker, ...SKIP_MARKERS].some(marker => message.includes(marker.toLowerCase()));
}

/**
 * False until both sides are known, so stages gated on a version change
 * cannot fire before the versioning stage has completed.
 */
export function versionChanged(run: Pick<PipelineRun, 'oldVersion' | 'newVersion'>): boolean {
  if (!run.oldVersion || !run.newVersion) return false;
  return !semVerEquals(run.oldVersion, run.newVersion);
}
