import type { RedisConnection } from '../persistence/redis-client.js';
import type { IdempotencyStore } from '../persistence/types.js';
import type { InMemorySemaphore, SemaphoreStats } from '../concurrency/semaphore.js';
import type { RunStatus, StageOutcomeKind } from '../pipeline/run.js';
import type { FailureCause } from '../pipeline/errors.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  redis: {
    enabled: boolean;
    healthy: boolean;
    mode: 'distributed' | 'degraded' | 'single-instance';
  };
  runs: {
    total: number;
    succeeded: number;
    failed: number;
    timedOut: number;
    released: number;
    inFlight: number;
  };
  stages: {
    succeeded: number;
    skipped: number;
    failed: number;
  };
  notifications: {
    sent: number;
    failed: number;
  };
  webhooks: {
    accepted: number;
    duplicates: number;
    ignored: number;
  };
  idempotency: {
    guardSize: number;
    guardMaxSize: number;
    guardTTLMs: number;
    type: 'redis' | 'memory';
  };
  runQueue: SemaphoreStats | null;
}

export interface SnapshotSources {
  idempotency?: IdempotencyStore;
  redis?: RedisConnection | null;
  runLock?: InMemorySemaphore;
}

export class Metrics {
  private startTime: Date = new Date();

  private counters = {
    runsTotal: 0,
    runsSucceeded: 0,
    runsFailed: 0,
    runsTimedOut: 0,
    runsReleased: 0,
    runsInFlight: 0,
    stagesSucceeded: 0,
    stagesSkipped: 0,
    stagesFailed: 0,
    notificationsSent: 0,
    notificationsFailed: 0,
    webhooksAccepted: 0,
    webhooksDuplicate: 0,
    webhooksIgnored: 0,
  };

  recordRunStarted(): void {
    this.counters.runsTotal++;
    this.counters.runsInFlight++;
  }

  recordRunFinished(status: RunStatus, cause: FailureCause | undefined, released: boolean): void {
    this.counters.runsInFlight = Math.max(0, this.counters.runsInFlight - 1);
    if (status === 'Succeeded') {
      this.counters.runsSucceeded++;
    } else if (status === 'Failed') {
      this.counters.runsFailed++;
      if (cause === 'timeout') this.counters.runsTimedOut++;
    }
    if (released) this.counters.runsReleased++;
  }

  recordStage(outcome: StageOutcomeKind): void {
    switch (outcome) {
      case 'succeeded':
        this.counters.stagesSucceeded++;
        break;
      case 'skipped':
        this.counters.stagesSkipped++;
        break;
      case 'failed':
        this.counters.stagesFailed++;
        break;
    }
  }

  recordNotificationSent(): void {
    this.counters.notificationsSent++;
  }

  recordNotificationFailed(): void {
    this.counters.notificationsFailed++;
  }

  recordWebhookAccepted(): void {
    this.counters.webhooksAccepted++;
  }

  recordDuplicateWebhook(): void {
    this.counters.webhooksDuplicate++;
  }

  recordWebhookIgnored(): void {
    this.counters.webhooksIgnored++;
  }

  snapshot(sources: SnapshotSources = {}): MetricsSnapshot {
    const uptimeSeconds = Math.floor((Date.now() - this.startTime.getTime()) / 1000);
    const idempotencyStats = sources.idempotency?.getStats() ?? { size: 0, maxSize: 0, ttlMs: 0, type: 'memory' as const };
    const redisEnabled = !!sources.redis;
    const redisHealthy = sources.redis?.isHealthy() ?? false;

    let redisMode: 'distributed' | 'degraded' | 'single-instance' = 'single-instance';
    if (redisEnabled) {
      redisMode = redisHealthy ? 'distributed' : 'degraded';
    }

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds,
      redis: {
        enabled: redisEnabled,
        healthy: redisHealthy,
        mode: redisMode,
      },
      runs: {
        total: this.counters.runsTotal,
        succeeded: this.counters.runsSucceeded,
        failed: this.counters.runsFailed,
        timedOut: this.counters.runsTimedOut,
        released: this.counters.runsReleased,
        inFlight: this.counters.runsInFlight,
      },
      stages: {
        succeeded: this.counters.stagesSucceeded,
        skipped: this.counters.stagesSkipped,
        failed: this.counters.stagesFailed,
      },
      notifications: {
        sent: this.counters.notificationsSent,
        failed: this.counters.notificationsFailed,
      },
      webhooks: {
        accepted: this.counters.webhooksAccepted,
        duplicates: this.counters.webhooksDuplicate,
        ignored: this.counters.webhooksIgnored,
      },
      idempotency: {
        guardSize: idempotencyStats.size,
        guardMaxSize: idempotencyStats.maxSize,
        guardTTLMs: idempotencyStats.ttlMs,
        type: idempotencyStats.type,
      },
      runQueue: sources.runLock?.getStats() ?? null,
    };
  }
}

export const metrics = new Metrics();
