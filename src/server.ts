import express from 'express';
import type { Express } from 'express';
import { createWebhookHandler, type WebhookDependencies } from './webhook/handler.js';
import type { FinishedRunStatus, RunHistory, RunQuery } from './runs/types.js';
import type { RedisConnection } from './persistence/redis-client.js';
import type { InMemorySemaphore } from './concurrency/semaphore.js';
import { logger, errorMessage } from './observability/logger.js';
import { metrics } from './metrics/metrics.js';

const MAX_WEBHOOK_BODY = '5mb';

export interface ServerDependencies extends WebhookDependencies {
  history: RunHistory;
  redis: RedisConnection | null;
  runLock: InMemorySemaphore;
}

const MAX_RUNS_LIMIT = 100;

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isFinishedStatus(value: string): value is FinishedRunStatus {
  return value === 'Succeeded' || value === 'Failed';
}

/** `?limit=&branch=&status=`; undefined when a filter value is not understood. */
export function parseRunQuery(query: Record<string, unknown>): RunQuery | undefined {
  const requested = parseInt(queryString(query.limit) ?? '', 10);
  const limit = Math.min(Math.max(1, Number.isNaN(requested) ? 50 : requested), MAX_RUNS_LIMIT);

  const status = queryString(query.status);
  if (status !== undefined && !isFinishedStatus(status)) return undefined;

  return { limit, branch: queryString(query.branch), status };
}

export function createApp(deps: ServerDependencies): Express {
  const app = express();
  const webhookHandler = createWebhookHandler(deps);

  // The signature covers the exact bytes GitHub sent, so the body stays raw here.
  app.post('/webhook', express.raw({ type: 'application/json', limit: MAX_WEBHOOK_BODY }), async (req, res, next) => {
    try {
      await webhookHandler(req, res);
    } catch (error) {
      logger.error('webhook_error', 'Unhandled webhook error', { error: errorMessage(error) });
      next(error);
    }
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (_req, res) => {
    res.status(200).json(metrics.snapshot({ idempotency: deps.idempotency, redis: deps.redis, runLock: deps.runLock }));
  });

  app.get('/runs', async (req, res) => {
    const query = parseRunQuery(req.query);
    if (!query) {
      res.status(400).json({ error: 'status must be Succeeded or Failed' });
      return;
    }

    try {
      const runs = await deps.history.list(query);
      const stats = await deps.history.getStats();

      res.status(200).json({
        runs,
        meta: {
          count: runs.length,
          ...query,
          total: stats.count,
          maxSize: stats.maxSize,
          storageType: stats.type,
        },
      });
    } catch (error) {
      logger.error('runs_error', 'Failed to retrieve run history', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to retrieve runs' });
    }
  });

  app.get('/runs/:runId', async (req, res) => {
    try {
      const run = await deps.history.get(req.params.runId);
      if (!run) {
        res.status(404).json({ error: 'Run not found' });
        return;
      }
      res.status(200).json(run);
    } catch (error) {
      logger.error('runs_error', 'Failed to retrieve run', { error: errorMessage(error), runId: req.params.runId });
      res.status(500).json({ error: 'Failed to retrieve run' });
    }
  });

  return app;
}
