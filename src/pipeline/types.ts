import type { PipelineRun } from './run.js';
import type { NotificationAggregator } from '../notifications/aggregator.js';

export type GuardPredicate = 'notSkipped' | 'onTargetBranch' | 'versionChanged';

/** abort-run is the only policy: a failed stage ends the run. */
export type WhenFailed = 'abort-run';

export interface StageContext {
  run: PipelineRun;
  signal: AbortSignal;
  notifications: NotificationAggregator;
}

/** Resolves with an optional human-readable summary; rejects on failure. */
export type StageAction = (context: StageContext) => Promise<string | void>;

export interface Stage {
  name: string;
  guard: GuardPredicate[];
  action: StageAction;
  whenFailed: WhenFailed;
}

export interface StageOutcome {
  ok: boolean;
  message: string;
  durationMs: number;
}
