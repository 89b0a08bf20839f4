// tests/unit/subscriptionStores.test.ts

import { describe, it, expect, vi } from 'vitest';
import { MemorySubscriptionStore } from '../../src/subscriptions/MemorySubscriptionStore';
import {
  RedisSubscriptionStore,
  resultKey,
  type RedisCommands,
} from '../../src/subscriptions/RedisSubscriptionStore';
import type { Notification, Subscription, SubscriptionStore } from '../../src/subscriptions/types';
import { makeResult, silentLogger } from '../helpers';

/** In-process stand-in for the Redis commands the store issues */
class FakeRedis implements RedisCommands {
  values = new Map<string, string>();
  ttls = new Map<string, number>();
  lists = new Map<string, string[]>();
  quit = vi.fn(async (): Promise<void> => undefined);

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.values.set(key, value);
    if (ttlSeconds !== undefined) this.ttls.set(key, ttlSeconds);
  }

  async exists(key: string): Promise<boolean> {
    return this.values.has(key);
  }

  async scan(pattern: string): Promise<string[]> {
    const prefix = pattern.replace(/\*$/, '');
    return Array.from(this.values.keys()).filter((key) => key.startsWith(prefix));
  }

  async lPush(key: string, value: string): Promise<void> {
    this.lists.set(key, [value, ...(this.lists.get(key) ?? [])]);
  }

  async lTrim(key: string, start: number, stop: number): Promise<void> {
    this.lists.set(key, (this.lists.get(key) ?? []).slice(start, stop + 1));
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    return (this.lists.get(key) ?? []).slice(start, stop + 1);
  }
}

function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-1',
    userId: 'user-1',
    keywords: ['vitest'],
    platforms: ['github'],
    detail: '',
    active: true,
    createdAt: '2024-06-01T12:00:00.000Z',
    ...overrides,
  };
}

function makeNotification(createdAt: string, overrides: Partial<Notification> = {}): Notification {
  return {
    subscriptionId: 'sub-1',
    userId: 'user-1',
    keywords: ['vitest'],
    platforms: ['github'],
    newResultsCount: 1,
    results: [{ ...makeResult({ platform: 'github' }), relevanceScore: 8, relevanceReason: 'match' }],
    createdAt,
    ...overrides,
  };
}

const stores: Array<[string, () => SubscriptionStore]> = [
  ['MemorySubscriptionStore', () => new MemorySubscriptionStore()],
  ['RedisSubscriptionStore', () => new RedisSubscriptionStore(new FakeRedis(), silentLogger())],
];

describe.each(stores)('%s', (_name, createStore) => {
  it('should save and read back a subscription', async () => {
    const store = createStore();
    const subscription = makeSubscription({ email: 'user@example.com' });

    await store.save(subscription);

    await expect(store.get('user-1', 'sub-1')).resolves.toEqual(subscription);
    await expect(store.get('user-2', 'sub-1')).resolves.toBeUndefined();
  });

  it('should list only active subscriptions', async () => {
    const store = createStore();
    await store.save(makeSubscription({ id: 'a' }));
    await store.save(makeSubscription({ id: 'b', active: false }));
    await store.save(makeSubscription({ id: 'c', userId: 'user-2' }));

    const active = await store.listActive();

    expect(active.map((s) => s.id).sort()).toEqual(['a', 'c']);
  });

  it('should record when a subscription was checked', async () => {
    const store = createStore();
    await store.save(makeSubscription());

    await store.markChecked('user-1', 'sub-1', new Date('2024-06-02T08:00:00.000Z'));
    await store.markChecked('user-1', 'missing', new Date('2024-06-02T08:00:00.000Z'));

    const subscription = await store.get('user-1', 'sub-1');
    expect(subscription?.lastCheckedAt).toBe('2024-06-02T08:00:00.000Z');
    await expect(store.get('user-1', 'missing')).resolves.toBeUndefined();
  });

  it('should track seen urls per platform', async () => {
    const store = createStore();

    await store.markSeen('github', ['https://github.com/a/b', 'https://github.com/c/d']);

    await expect(store.hasSeen('github', 'https://github.com/a/b')).resolves.toBe(true);
    await expect(store.hasSeen('reddit', 'https://github.com/a/b')).resolves.toBe(false);
    await expect(store.hasSeen('github', 'https://github.com/e/f')).resolves.toBe(false);
  });

  it('should list notifications newest first', async () => {
    const store = createStore();
    const older = makeNotification('2024-06-01T10:00:00.000Z');
    const newer = makeNotification('2024-06-01T11:00:00.000Z', { newResultsCount: 3 });

    await store.pushNotification(older);
    await store.pushNotification(newer);

    await expect(store.listNotifications('user-1')).resolves.toEqual([newer, older]);
    await expect(store.listNotifications('user-1', 1)).resolves.toEqual([newer]);
    await expect(store.listNotifications('user-2')).resolves.toEqual([]);
  });

  it('should keep at most 100 notifications per user', async () => {
    const store = createStore();
    const start = Date.parse('2024-06-01T00:00:00.000Z');

    for (let i = 0; i < 105; i++) {
      await store.pushNotification(makeNotification(new Date(start + i * 60000).toISOString()));
    }

    const notifications = await store.listNotifications('user-1', 200);
    expect(notifications).toHaveLength(100);
    expect(notifications[0].createdAt).toBe(new Date(start + 104 * 60000).toISOString());
    expect(notifications[99].createdAt).toBe(new Date(start + 5 * 60000).toISOString());
  });
});

describe('RedisSubscriptionStore', () => {
  it('should key seen results by platform and url hash', () => {
    const key = resultKey('github', 'https://github.com/a/b');

    expect(key).toMatch(/^result:github:[0-9a-f]{32}$/);
    expect(resultKey('github', 'https://github.com/a/b')).toBe(key);
    expect(resultKey('github', 'https://github.com/a/c')).not.toBe(key);
  });

  it('should expire seen markers and notifications', async () => {
    const redis = new FakeRedis();
    const store = new RedisSubscriptionStore(redis, silentLogger(), 3600);

    await store.markSeen('reddit', ['https://www.reddit.com/r/x/1']);
    await store.pushNotification(makeNotification('2024-06-01T10:00:00.000Z'));

    expect(redis.ttls.get(resultKey('reddit', 'https://www.reddit.com/r/x/1'))).toBe(3600);
    expect(redis.ttls.get(`notification:user-1:${Date.parse('2024-06-01T10:00:00.000Z')}`)).toBe(
      7 * 24 * 60 * 60
    );
  });

  it('should store subscriptions without expiry', async () => {
    const redis = new FakeRedis();
    const store = new RedisSubscriptionStore(redis, silentLogger());

    await store.save(makeSubscription());

    expect(redis.values.has('subscription:user-1:sub-1')).toBe(true);
    expect(redis.ttls.has('subscription:user-1:sub-1')).toBe(false);
  });

  it('should skip malformed and expired entries', async () => {
    const redis = new FakeRedis();
    const store = new RedisSubscriptionStore(redis, silentLogger());
    const valid = makeNotification('2024-06-01T10:00:00.000Z');

    await store.pushNotification(valid);
    await redis.lPush('notifications:user-1', 'notification:user-1:expired');
    await redis.set('notification:user-1:broken', '{"not": "a notification"}');
    await redis.lPush('notifications:user-1', 'notification:user-1:broken');
    await redis.set('subscription:user-1:bad', 'not json');
    await store.save(makeSubscription({ id: 'good' }));

    await expect(store.listNotifications('user-1')).resolves.toEqual([valid]);
    await expect(store.listActive()).resolves.toEqual([makeSubscription({ id: 'good' })]);
  });

  it('should quit the connection on close', async () => {
    const redis = new FakeRedis();

    await new RedisSubscriptionStore(redis, silentLogger()).close();

    expect(redis.quit).toHaveBeenCalledTimes(1);
  });

  it('should not reject when quitting fails', async () => {
    const redis = new FakeRedis();
    redis.quit.mockRejectedValueOnce(new Error('already closed'));

    await expect(new RedisSubscriptionStore(redis, silentLogger()).close()).resolves.toBeUndefined();
  });
});
