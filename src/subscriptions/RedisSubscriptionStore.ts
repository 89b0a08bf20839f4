// src/subscriptions/RedisSubscriptionStore.ts

import crypto from 'crypto';
import { createClient } from 'redis';
import type { Logger } from '../observability/Logger';
import {
  NotificationSchema,
  SubscriptionSchema,
  type Notification,
  type Subscription,
  type SubscriptionStore,
} from './types';
import { MAX_NOTIFICATIONS_PER_USER } from './MemorySubscriptionStore';
import { errorMessage } from '../utils/errors';

const NOTIFICATION_TTL_SECONDS = 7 * 24 * 60 * 60;
const DEFAULT_SEEN_TTL_SECONDS = 90 * 24 * 60 * 60;

/** The slice of the Redis command set this store uses */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  exists(key: string): Promise<boolean>;
  scan(pattern: string): Promise<string[]>;
  lPush(key: string, value: string): Promise<void>;
  lTrim(key: string, start: number, stop: number): Promise<void>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;
  quit(): Promise<void>;
}

type RedisClient = ReturnType<typeof createClient>;

function toCommands(client: RedisClient): RedisCommands {
  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, ttlSeconds ? { EX: ttlSeconds } : undefined);
    },
    exists: async (key) => (await client.exists(key)) > 0,
    scan: async (pattern) => {
      const keys: string[] = [];
      for await (const key of client.scanIterator({ MATCH: pattern, COUNT: 100 })) {
        keys.push(key);
      }
      return keys;
    },
    lPush: async (key, value) => {
      await client.lPush(key, value);
    },
    lTrim: async (key, start, stop) => {
      await client.lTrim(key, start, stop);
    },
    lRange: (key, start, stop) => client.lRange(key, start, stop),
    quit: async () => {
      await client.quit();
    },
  };
}

export function resultKey(platform: string, url: string): string {
  const hash = crypto.createHash('md5').update(url, 'utf8').digest('hex');
  return `result:${platform}:${hash}`;
}

/**
 * Subscription state shared by every checker instance.
 *
 * Keys:
 * - `subscription:{userId}:{id}` subscription JSON
 * - `result:{platform}:{md5(url)}` marks a result URL as already reported
 * - `notification:{userId}:{timestamp}` notification JSON, kept 7 days
 * - `notifications:{userId}` newest-first list of notification keys, capped at 100
 */
export class RedisSubscriptionStore implements SubscriptionStore {
  constructor(
    private redis: RedisCommands,
    private logger: Logger,
    private seenTtlSeconds: number = DEFAULT_SEEN_TTL_SECONDS
  ) {}

  /**
   * Connect to Redis and build a store on the connection.
   * Rejects when the first connection attempt fails.
   */
  static async connect(redisUrl: string, logger: Logger): Promise<RedisSubscriptionStore> {
    const client = createClient({
      url: redisUrl,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            logger.error('Redis reconnect failed after 10 attempts');
            return new Error('Max reconnect attempts reached');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', (err: Error) => {
      logger.error('Redis client error', { error: err.message });
    });
    client.on('reconnecting', () => {
      logger.warn('Redis reconnecting');
    });

    await client.connect();
    logger.info('Redis connected for subscription store');

    return new RedisSubscriptionStore(toCommands(client), logger);
  }

  async listActive(): Promise<Subscription[]> {
    const keys = await this.redis.scan('subscription:*');
    const subscriptions: Subscription[] = [];

    for (const key of keys) {
      const subscription = await this.read(key);
      if (subscription?.active) {
        subscriptions.push(subscription);
      }
    }

    return subscriptions;
  }

  async get(userId: string, id: string): Promise<Subscription | undefined> {
    return this.read(`subscription:${userId}:${id}`);
  }

  async save(subscription: Subscription): Promise<void> {
    await this.redis.set(
      `subscription:${subscription.userId}:${subscription.id}`,
      JSON.stringify(subscription)
    );
  }

  async markChecked(userId: string, id: string, checkedAt: Date): Promise<void> {
    const existing = await this.get(userId, id);
    if (!existing) return;
    await this.save({ ...existing, lastCheckedAt: checkedAt.toISOString() });
  }

  async hasSeen(platform: string, url: string): Promise<boolean> {
    return this.redis.exists(resultKey(platform, url));
  }

  async markSeen(platform: string, urls: string[]): Promise<void> {
    for (const url of urls) {
      await this.redis.set(resultKey(platform, url), '1', this.seenTtlSeconds);
    }
  }

  async pushNotification(notification: Notification): Promise<void> {
    const key = `notification:${notification.userId}:${Date.parse(notification.createdAt)}`;
    const listKey = `notifications:${notification.userId}`;

    await this.redis.set(key, JSON.stringify(notification), NOTIFICATION_TTL_SECONDS);
    await this.redis.lPush(listKey, key);
    await this.redis.lTrim(listKey, 0, MAX_NOTIFICATIONS_PER_USER - 1);
  }

  async listNotifications(userId: string, limit = MAX_NOTIFICATIONS_PER_USER): Promise<Notification[]> {
    const keys = await this.redis.lRange(`notifications:${userId}`, 0, limit - 1);
    const notifications: Notification[] = [];

    // Expired entries leave dangling keys in the list
    for (const key of keys) {
      const raw = await this.redis.get(key);
      if (raw === null) continue;

      const parsed = NotificationSchema.safeParse(parseJson(raw));
      if (parsed.success) {
        notifications.push(parsed.data);
      } else {
        this.logger.warn('Skipping malformed notification', { key });
      }
    }

    return notifications;
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
      this.logger.info('Subscription store disconnected');
    } catch (error: unknown) {
      this.logger.error('Error disconnecting Redis', { error: errorMessage(error) });
    }
  }

  private async read(key: string): Promise<Subscription | undefined> {
    const raw = await this.redis.get(key);
    if (raw === null) return undefined;

    const parsed = SubscriptionSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn('Skipping malformed subscription', { key });
      return undefined;
    }
    return parsed.data;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
