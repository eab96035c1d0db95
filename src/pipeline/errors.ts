export type FailureCause = 'stage_error' | 'timeout';

export class StageActionError extends Error {
  constructor(
    public readonly stage: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StageActionError';
  }
}

export class PipelineTimeoutError extends Error {
  constructor(
    public readonly budgetMs: number,
    public readonly stage?: string
  ) {
    super(`Pipeline exceeded its time budget of ${Math.round(budgetMs / 1000)}s${stage ? ` during stage ${stage}` : ''}`);
    this.name = 'PipelineTimeoutError';
  }
}

export class NotificationDeliveryError extends Error {
  constructor(
    public readonly channel: string,
    message: string
  ) {
    super(message);
    this.name = 'NotificationDeliveryError';
  }
}

/** Built when a guard predicate throws; logged and resolved to false, never propagated. */
export class GuardError extends Error {
  constructor(
    public readonly stage: string,
    message: string
  ) {
    super(message);
    this.name = 'GuardError';
  }
}
