import type { Redis } from 'ioredis';
import type { RunHistory, RunHistoryStats, RunQuery, RunRecord } from './types.js';
import { parseRunRecord } from './schema.js';
import type { RedisSource } from '../persistence/redis-client.js';
import { logger, errorMessage } from '../observability/logger.js';

export const MAX_IN_MEMORY_RUNS = 100;
export const MAX_REDIS_RUNS = 500;
const DEFAULT_LIMIT = 50;

const RUN_KEY_PREFIX = 'run:';
// Sorted set of run ids scored by start time.
const RUN_INDEX_KEY = 'runs:by-start';

function matches(record: RunRecord, query: RunQuery): boolean {
  if (query.branch !== undefined && record.branch !== query.branch) return false;
  if (query.status !== undefined && record.status !== query.status) return false;
  return true;
}

export class InMemoryRunHistory implements RunHistory {
  // Insertion order is start order, so the first key is the oldest run.
  private readonly runs = new Map<string, RunRecord>();

  async append(record: RunRecord): Promise<void> {
    this.runs.delete(record.runId);
    this.runs.set(record.runId, record);

    while (this.runs.size > MAX_IN_MEMORY_RUNS) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
  }

  async get(runId: string): Promise<RunRecord | null> {
    return this.runs.get(runId) ?? null;
  }

  async list(query: RunQuery = {}): Promise<RunRecord[]> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    return [...this.runs.values()].reverse().filter(record => matches(record, query)).slice(0, limit);
  }

  async getStats(): Promise<RunHistoryStats> {
    return { count: this.runs.size, maxSize: MAX_IN_MEMORY_RUNS, type: 'memory' };
  }
}

/**
 * Run records shared across instances: one JSON value per run plus an index
 * by start time. Every record is also kept in this instance's memory, which
 * answers reads while Redis is unavailable.
 */
export class RedisRunHistory implements RunHistory {
  constructor(
    private readonly source: RedisSource,
    private readonly fallback: InMemoryRunHistory = new InMemoryRunHistory()
  ) {}

  async append(record: RunRecord): Promise<void> {
    await this.fallback.append(record);

    const redis = this.source.ready();
    if (!redis) {
      logger.warn('run_history_degraded', 'Redis unavailable, run kept in memory only', { runId: record.runId });
      return;
    }

    try {
      await redis
        .multi()
        .set(RUN_KEY_PREFIX + record.runId, JSON.stringify(record))
        .zadd(RUN_INDEX_KEY, Date.parse(record.startedAt), record.runId)
        .exec();
      await this.trim(redis);
    } catch (error) {
      logger.error('run_history_error', 'Failed to store run in Redis', {
        error: errorMessage(error),
        runId: record.runId,
      });
    }
  }

  async get(runId: string): Promise<RunRecord | null> {
    const redis = this.source.ready();
    if (!redis) return this.fallback.get(runId);

    try {
      const raw = await redis.get(RUN_KEY_PREFIX + runId);
      return raw === null ? null : this.parse(runId, raw);
    } catch (error) {
      logger.error('run_history_error', 'Failed to read run from Redis', { error: errorMessage(error), runId });
      return this.fallback.get(runId);
    }
  }

  async list(query: RunQuery = {}): Promise<RunRecord[]> {
    const redis = this.source.ready();
    if (!redis) return this.fallback.list(query);

    const limit = query.limit ?? DEFAULT_LIMIT;
    const filtered = query.branch !== undefined || query.status !== undefined;

    try {
      // Filters apply after loading, so a filtered query scans the whole index.
      const ids = await redis.zrevrange(RUN_INDEX_KEY, 0, (filtered ? MAX_REDIS_RUNS : limit) - 1);
      if (ids.length === 0) return [];

      const values = await redis.mget(...ids.map(id => RUN_KEY_PREFIX + id));
      const records: RunRecord[] = [];
      values.forEach((raw, index) => {
        const record = raw === null ? null : this.parse(ids[index], raw);
        if (record && matches(record, query)) records.push(record);
      });
      return records.slice(0, limit);
    } catch (error) {
      logger.error('run_history_error', 'Failed to list runs from Redis', { error: errorMessage(error) });
      return this.fallback.list(query);
    }
  }

  async getStats(): Promise<RunHistoryStats> {
    const redis = this.source.ready();
    if (!redis) return this.fallback.getStats();

    try {
      return { count: await redis.zcard(RUN_INDEX_KEY), maxSize: MAX_REDIS_RUNS, type: 'redis' };
    } catch (error) {
      logger.warn('run_history_error', 'Failed to count runs in Redis', { error: errorMessage(error) });
      return this.fallback.getStats();
    }
  }

  private async trim(redis: Redis): Promise<void> {
    const stale = await redis.zrange(RUN_INDEX_KEY, 0, -(MAX_REDIS_RUNS + 1));
    if (stale.length === 0) return;

    await redis
      .multi()
      .del(...stale.map(id => RUN_KEY_PREFIX + id))
      .zrem(RUN_INDEX_KEY, ...stale)
      .exec();
  }

  private parse(runId: string, raw: string): RunRecord | null {
    const record = parseRunRecord(raw);
    if (!record) {
      logger.warn('run_history_error', 'Ignoring malformed run record', { runId });
    }
    return record;
  }
}

export function createRunHistory(redis: RedisSource | null): RunHistory {
  return redis ? new RedisRunHistory(redis) : new InMemoryRunHistory();
}
