import type { Stage, StageContext, StageOutcome } from './types.js';
import { logger, errorMessage } from '../observability/logger.js';

/**
 * Runs one stage action and folds every error into `ok: false`. No retries
 * happen here; an action that wants them must do its own.
 */
export class StageRunner {
  async run(stage: Stage, context: StageContext): Promise<StageOutcome> {
    const startTime = Date.now();

    if (context.signal.aborted) {
      return {
        ok: false,
        message: abortMessage(context.signal),
        durationMs: 0,
      };
    }

    logger.info('stage_start', `Running stage ${stage.name}`, { stage: stage.name });

    try {
      const summary = await raceAbort(stage.action(context), context.signal);
      const durationMs = Date.now() - startTime;

      logger.info('stage_complete', `Stage ${stage.name} succeeded`, {
        stage: stage.name,
        durationMs,
      });

      return {
        ok: true,
        message: summary || `${stage.name} succeeded`,
        durationMs,
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = context.signal.aborted ? abortMessage(context.signal) : errorMessage(error);

      logger.error('stage_failed', `Stage ${stage.name} failed`, {
        stage: stage.name,
        durationMs,
        error: message,
      });

      return { ok: false, message, durationMs };
    }
  }
}

function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : 'Run aborted';
}

/**
 * Settles as soon as the signal aborts, even if the action ignores it. The
 * action still receives the signal and is expected to stop its own work.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
