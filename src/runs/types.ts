import type { RunStatus, RunFailure, StageResult } from '../pipeline/run.js';
import type { FlushResult } from '../notifications/types.js';

export type FinishedRunStatus = Exclude<RunStatus, 'Running'>;

export interface RunRecord {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  branch: string;
  commitHash: string;
  skipCI: boolean;
  status: FinishedRunStatus;
  oldVersion: string | null;
  newVersion: string | null;
  versionChanged: boolean;
  failure: RunFailure | null;
  stages: StageResult[];
  notification: FlushResult['status'];
  stateHistory: string[];
}

export interface RunQuery {
  /** Newest first; defaults to 50. */
  limit?: number;
  branch?: string;
  status?: FinishedRunStatus;
}

export interface RunHistoryStats {
  count: number;
  maxSize: number;
  type: 'memory' | 'redis';
}

export interface RunHistory {
  append(record: RunRecord): Promise<void>;
  get(runId: string): Promise<RunRecord | null>;
  list(query?: RunQuery): Promise<RunRecord[]>;
  getStats(): Promise<RunHistoryStats>;
}
