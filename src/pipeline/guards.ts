import type { GuardPredicate, Stage } from './types.js';
import { type PipelineRun, versionChanged } from './run.js';
import { GuardError } from './errors.js';
import { logger, errorMessage } from '../observability/logger.js';

export type GuardSubject = Pick<PipelineRun, 'skipCI' | 'branchName' | 'oldVersion' | 'newVersion'>;

export class GuardEvaluator {
  constructor(private readonly targetBranch: string) {}

  /** Conjunction of the stage's predicates; an empty guard always runs. */
  shouldRun(stage: Pick<Stage, 'name' | 'guard'>, run: GuardSubject): boolean {
    return stage.guard.every(predicate => this.evaluate(stage.name, predicate, run));
  }

  private evaluate(stageName: string, predicate: GuardPredicate, run: GuardSubject): boolean {
    try {
      switch (predicate) {
        case 'notSkipped':
          return run.skipCI === false;
        case 'onTargetBranch':
          return run.branchName === this.targetBranch;
        case 'versionChanged':
          return versionChanged(run);
      }
    } catch (error) {
      const guardError = new GuardError(stageName, `Guard ${predicate} could not be evaluated: ${errorMessage(error)}`);
      logger.warn('guard_evaluation', guardError.message, {
        stage: stageName,
        predicate,
      });
      return false;
    }
  }
}
