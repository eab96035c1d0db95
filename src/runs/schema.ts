import { z } from 'zod';
import type { RunRecord } from './types.js';

const stageResultSchema = z.object({
  stage: z.string(),
  outcome: z.enum(['skipped', 'succeeded', 'failed']),
  durationMs: z.number(),
  message: z.string().optional(),
});

const runFailureSchema = z.object({
  stage: z.string().optional(),
  cause: z.enum(['stage_error', 'timeout']),
  message: z.string(),
});

export const runRecordSchema = z.object({
  runId: z.string().min(1),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number(),
  branch: z.string(),
  commitHash: z.string(),
  skipCI: z.boolean(),
  status: z.enum(['Succeeded', 'Failed']),
  oldVersion: z.string().nullable(),
  newVersion: z.string().nullable(),
  versionChanged: z.boolean(),
  failure: runFailureSchema.nullable(),
  stages: z.array(stageResultSchema),
  notification: z.enum(['skipped', 'sent', 'failed']),
  stateHistory: z.array(z.string()),
});

/** Null for anything that is not a stored run record, e.g. a value from an older release. */
export function parseRunRecord(raw: string): RunRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = runRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}
