import type { IdempotencyCheck, IdempotencyStats, IdempotencyStore } from '../persistence/types.js';
import type { RedisSource } from '../persistence/redis-client.js';
import { logger, errorMessage } from '../observability/logger.js';

const MAX_ENTRIES = 1000;
const TTL_SECONDS = 3600;
const TTL_MS = TTL_SECONDS * 1000;

interface IdempotencyEntry {
  firstSeenAt: Date;
  lastSeenAt: Date;
  count: number;
}

export class InMemoryIdempotencyGuard implements IdempotencyStore {
  // Map iteration order is insertion order, so the first key is the oldest.
  private entries: Map<string, IdempotencyEntry> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async checkAndMark(key: string): Promise<IdempotencyCheck> {
    this.evictExpired();

    const existing = this.entries.get(key);
    if (existing) {
      existing.lastSeenAt = new Date(this.now());
      existing.count++;
      return { status: 'duplicate_recent', firstSeenAt: existing.firstSeenAt };
    }

    if (this.entries.size >= MAX_ENTRIES) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }

    const seenAt = new Date(this.now());
    this.entries.set(key, { firstSeenAt: seenAt, lastSeenAt: seenAt, count: 1 });
    return { status: 'new' };
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (now - entry.lastSeenAt.getTime() > TTL_MS) {
        this.entries.delete(key);
      }
    }
  }

  getStats(): IdempotencyStats {
    return {
      size: this.entries.size,
      maxSize: MAX_ENTRIES,
      ttlMs: TTL_MS,
      type: 'memory',
    };
  }
}

/** Shares de-duplication across instances; this instance's memory covers Redis outages. */
export class RedisIdempotencyGuard implements IdempotencyStore {
  constructor(
    private readonly source: RedisSource,
    private readonly fallback: InMemoryIdempotencyGuard = new InMemoryIdempotencyGuard()
  ) {}

  async checkAndMark(key: string): Promise<IdempotencyCheck> {
    const redis = this.source.ready();
    if (!redis) {
      logger.warn('idempotency_degraded', 'Redis unavailable, de-duplicating in memory only', { key });
      return this.fallback.checkAndMark(key);
    }

    const redisKey = `delivery:${key}`;
    const seenAt = Date.now();
    try {
      // The value is the first-seen time, so a duplicate can report it.
      const result = await redis.set(redisKey, String(seenAt), 'EX', TTL_SECONDS, 'NX');
      if (result !== null) {
        return { status: 'new' };
      }

      const firstSeen = Number(await redis.get(redisKey));
      return {
        status: 'duplicate_recent',
        firstSeenAt: new Date(Number.isFinite(firstSeen) && firstSeen > 0 ? firstSeen : seenAt),
      };
    } catch (error) {
      logger.error('idempotency_redis_error', 'Redis operation failed, de-duplicating in memory', {
        error: errorMessage(error),
        key,
      });
      return this.fallback.checkAndMark(key);
    }
  }

  getStats(): IdempotencyStats {
    return {
      size: this.fallback.getStats().size,
      maxSize: MAX_ENTRIES,
      ttlMs: TTL_MS,
      type: 'redis',
    };
  }
}

export function createIdempotencyGuard(redis: RedisSource | null): IdempotencyStore {
  if (redis) {
    logger.info('idempotency_initialization', 'Using Redis-backed idempotency guard');
    return new RedisIdempotencyGuard(redis);
  }
  logger.info('idempotency_initialization', 'Using in-memory idempotency guard');
  return new InMemoryIdempotencyGuard();
}
