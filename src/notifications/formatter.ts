import type { PipelineRun } from '../pipeline/run.js';
import { formatSemVer } from '../version/semver.js';

export function formatSuccessNotice(serviceName: string, run: PipelineRun): string {
  const version = run.newVersion ? formatSemVer(run.newVersion) : 'unknown';
  return `${serviceName} released ${version}`;
}

export function formatFailureNotice(serviceName: string, run: PipelineRun): string {
  const stage = run.failure?.stage ?? 'unknown';
  const reason = run.failure?.cause === 'timeout' ? 'timed out' : run.failure?.message ?? 'unknown error';
  return `${serviceName} pipeline failed on ${run.branchName} at stage ${stage}: ${reason}`;
}

export function commitBuiltEvent(commitHash: string): string {
  return `COMMIT BUILT : ${commitHash}`;
}

export function newVersionEvent(version: string): string {
  return `NEW_SEMANTIC_VERSION/DOCKER IMAGE TAG : ${version}`;
}
