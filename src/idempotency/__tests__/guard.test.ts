import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryIdempotencyGuard, RedisIdempotencyGuard, createIdempotencyGuard } from '../guard.js';
import { silenceLogs } from '../../__tests__/helpers/fakes.js';

describe('InMemoryIdempotencyGuard', () => {
  it('marks the first sighting as new and repeats as duplicates', async () => {
    let now = 1_000_000;
    const guard = new InMemoryIdempotencyGuard(() => now);

    assert.deepEqual(await guard.checkAndMark('delivery-1'), { status: 'new' });
    now += 5_000;
    assert.deepEqual(await guard.checkAndMark('delivery-1'), {
      status: 'duplicate_recent',
      firstSeenAt: new Date(1_000_000),
    });
  });

  it('forgets keys after the ttl', async () => {
    let now = 0;
    const guard = new InMemoryIdempotencyGuard(() => now);

    await guard.checkAndMark('delivery-1');
    now = 3600 * 1000 + 1;

    assert.deepEqual(await guard.checkAndMark('delivery-1'), { status: 'new' });
  });

  it('evicts the oldest key once full', async () => {
    const guard = new InMemoryIdempotencyGuard(() => 0);
    for (let i = 0; i < 1000; i++) {
      await guard.checkAndMark(`delivery-${i}`);
    }

    await guard.checkAndMark('delivery-1000');

    assert.equal(guard.getStats().size, 1000);
    assert.deepEqual(await guard.checkAndMark('delivery-0'), { status: 'new' });
  });
});

describe('RedisIdempotencyGuard', () => {
  before(() => silenceLogs());

  it('de-duplicates in memory while redis is unavailable', async () => {
    const fallback = new InMemoryIdempotencyGuard(() => 1_000);
    const guard = new RedisIdempotencyGuard({ ready: () => null }, fallback);

    assert.deepEqual(await guard.checkAndMark('delivery-1'), { status: 'new' });
    assert.deepEqual(await guard.checkAndMark('delivery-1'), {
      status: 'duplicate_recent',
      firstSeenAt: new Date(1_000),
    });
    assert.deepEqual(guard.getStats(), { size: 1, maxSize: 1000, ttlMs: 3_600_000, type: 'redis' });
  });

  it('is only chosen when a redis connection exists', () => {
    assert.ok(createIdempotencyGuard(null) instanceof InMemoryIdempotencyGuard);
    assert.ok(createIdempotencyGuard({ ready: () => null }) instanceof RedisIdempotencyGuard);
  });
});
