import { logger } from '../observability/logger.js';

export interface SemaphoreStats {
  maxPermits: number;
  inFlight: number;
  waiting: number;
  peakInFlight: number;
}

/**
 * FIFO counting semaphore. `acquire` queues instead of failing, so every
 * accepted run eventually starts, in arrival order.
 */
export class InMemorySemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];
  private currentInFlight = 0;
  private peakInFlight = 0;

  constructor(maxPermits: number) {
    if (maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be > 0');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits === 0) return false;
    this.permits--;
    this.enter();
    return true;
  }

  acquire(): Promise<void> {
    if (this.tryAcquire()) return Promise.resolve();
    return new Promise<void>(resolve => this.waiting.push(resolve));
  }

  release(): void {
    if (this.currentInFlight === 0) {
      throw new Error('Semaphore released more often than acquired');
    }
    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      this.enter();
      next();
    } else {
      this.permits++;
    }
  }

  async runExclusive<T>(work: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  getStats(): SemaphoreStats {
    return {
      maxPermits: this.maxPermits,
      inFlight: this.currentInFlight,
      waiting: this.waiting.length,
      peakInFlight: this.peakInFlight,
    };
  }

  private enter(): void {
    this.currentInFlight++;
    if (this.currentInFlight > this.peakInFlight) {
      this.peakInFlight = this.currentInFlight;
    }
  }
}

const workDirLocks = new Map<string, InMemorySemaphore>();

/**
 * One permit per working directory: checkout, bump, build and tag push all
 * mutate the same clone, so runs sharing it must not interleave.
 */
export function workDirSemaphore(workDir: string): InMemorySemaphore {
  let semaphore = workDirLocks.get(workDir);
  if (!semaphore) {
    semaphore = new InMemorySemaphore(1);
    workDirLocks.set(workDir, semaphore);
    logger.info('semaphore_initialization', 'Serialising runs for working directory', { workDir });
  }
  return semaphore;
}
