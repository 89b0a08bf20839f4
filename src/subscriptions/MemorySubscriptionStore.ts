// src/subscriptions/MemorySubscriptionStore.ts

import type { Notification, Subscription, SubscriptionStore } from './types';

export const MAX_NOTIFICATIONS_PER_USER = 100;

/**
 * In-process store for a single instance or tests.
 * Mirrors the Redis store's semantics, minus expiry.
 */
export class MemorySubscriptionStore implements SubscriptionStore {
  private subscriptions: Map<string, Subscription> = new Map();
  private seen: Set<string> = new Set();
  private notifications: Map<string, Notification[]> = new Map();

  async listActive(): Promise<Subscription[]> {
    return Array.from(this.subscriptions.values()).filter((s) => s.active);
  }

  async get(userId: string, id: string): Promise<Subscription | undefined> {
    return this.subscriptions.get(`${userId}:${id}`);
  }

  async save(subscription: Subscription): Promise<void> {
    this.subscriptions.set(`${subscription.userId}:${subscription.id}`, { ...subscription });
  }

  async markChecked(userId: string, id: string, checkedAt: Date): Promise<void> {
    const key = `${userId}:${id}`;
    const existing = this.subscriptions.get(key);
    if (existing) {
      this.subscriptions.set(key, { ...existing, lastCheckedAt: checkedAt.toISOString() });
    }
  }

  async hasSeen(platform: string, url: string): Promise<boolean> {
    return this.seen.has(`${platform}:${url}`);
  }

  async markSeen(platform: string, urls: string[]): Promise<void> {
    for (const url of urls) {
      this.seen.add(`${platform}:${url}`);
    }
  }

  async pushNotification(notification: Notification): Promise<void> {
    const queue = this.notifications.get(notification.userId) ?? [];
    queue.unshift(notification);
    this.notifications.set(notification.userId, queue.slice(0, MAX_NOTIFICATIONS_PER_USER));
  }

  async listNotifications(userId: string, limit = MAX_NOTIFICATIONS_PER_USER): Promise<Notification[]> {
    return (this.notifications.get(userId) ?? []).slice(0, limit);
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
