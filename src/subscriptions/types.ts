// src/subscriptions/types.ts

import { z } from 'zod';
import type { FilteredResult } from '../core/processing/types';
import { RawResultSchema } from '../core/normalizer/Normalizer';

export const SubscriptionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  email: z.string().email().optional(),
  keywords: z.array(z.string().min(1)).min(1),
  platforms: z.array(z.string().min(1)).min(1),
  detail: z.string().default(''),
  active: z.boolean().default(true),
  createdAt: z.string().datetime(),
  lastCheckedAt: z.string().datetime().optional(),
});

export type Subscription = z.output<typeof SubscriptionSchema>;

// Stored form of a Notification, checked when read back
export const NotificationSchema = z.object({
  subscriptionId: z.string(),
  userId: z.string(),
  email: z.string().optional(),
  keywords: z.array(z.string()),
  platforms: z.array(z.string()),
  newResultsCount: z.number().int().nonnegative(),
  results: z.array(
    RawResultSchema.extend({
      relevanceScore: z.number().optional(),
      relevanceReason: z.string().optional(),
    })
  ),
  createdAt: z.string().datetime(),
});

export interface Notification {
  subscriptionId: string;
  userId: string;
  email?: string;
  keywords: string[];
  platforms: string[];
  newResultsCount: number;
  /** The first few new results; `newResultsCount` may be larger */
  results: FilteredResult[];
  createdAt: string;
}

export interface SubscriptionStore {
  listActive(): Promise<Subscription[]>;
  get(userId: string, id: string): Promise<Subscription | undefined>;
  save(subscription: Subscription): Promise<void>;
  markChecked(userId: string, id: string, checkedAt: Date): Promise<void>;
  hasSeen(platform: string, url: string): Promise<boolean>;
  markSeen(platform: string, urls: string[]): Promise<void>;
  pushNotification(notification: Notification): Promise<void>;
  listNotifications(userId: string, limit?: number): Promise<Notification[]>;
  close(): Promise<void>;
}

/** Delivery target for notifications (mail relay, webhook, log) */
export interface NotificationSink {
  deliver(notification: Notification): Promise<void>;
}

export interface CheckOutcome {
  subscriptionId: string;
  newResults: number;
  notified: boolean;
}
