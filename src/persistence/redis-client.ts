import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_RECONNECT_ATTEMPTS = 3;

/** Anything that can hand out a ready client; stores depend on this, not on a global. */
export interface RedisSource {
  ready(): Redis | null;
}

/**
 * Owns the shared ioredis client and tracks whether it can take commands.
 * Stores ask `ready()` per operation and fall back to memory on null.
 */
export class RedisConnection implements RedisSource {
  private healthy = false;

  private constructor(private readonly client: Redis) {
    client.on('ready', () => {
      this.healthy = true;
      logger.info('redis_lifecycle', 'Redis ready');
    });
    client.on('error', (error: Error) => {
      this.healthy = false;
      logger.error('redis_lifecycle', 'Redis error', { error: error.message });
    });
    client.on('end', () => {
      this.healthy = false;
      logger.warn('redis_lifecycle', 'Redis connection ended, stores fall back to memory');
    });
  }

  static connect(url: string): RedisConnection {
    const client = new Redis(url, {
      connectTimeout: CONNECT_TIMEOUT_MS,
      commandTimeout: COMMAND_TIMEOUT_MS,
      maxRetriesPerRequest: 2,
      retryStrategy: (attempt: number) => {
        if (attempt > MAX_RECONNECT_ATTEMPTS) return null;
        return Math.min(attempt * 200, 2000);
      },
    });
    logger.info('redis_initialization', 'Connecting to Redis for run history and webhook de-duplication');
    return new RedisConnection(client);
  }

  ready(): Redis | null {
    return this.healthy ? this.client : null;
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  async close(): Promise<void> {
    this.healthy = false;
    await this.client.quit();
  }
}
