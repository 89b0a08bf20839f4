// src/subscriptions/SubscriptionChecker.ts

import type { AggregationPipeline } from '../core/pipeline/AggregationPipeline';
import type { FilteredResult } from '../core/processing/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type {
  CheckOutcome,
  Notification,
  NotificationSink,
  Subscription,
  SubscriptionStore,
} from './types';
import { errorMessage } from '../utils/errors';
import { sleep } from '../utils/helpers';

export interface SubscriptionCheckerOptions {
  pauseBetweenChecksMs?: number;
  maxResultsPerNotification?: number;
  clock?: () => Date;
}

/**
 * Re-runs a subscription's search and reports the results nobody has seen yet.
 *
 * A result counts as new when its URL has not been recorded for its
 * platform. New URLs are recorded only after the notification is stored,
 * so a failed write leaves them to be reported by the next check.
 */
export class SubscriptionChecker {
  private pauseBetweenChecksMs: number;
  private maxResultsPerNotification: number;
  private clock: () => Date;

  constructor(
    private pipeline: Pick<AggregationPipeline, 'run'>,
    private store: SubscriptionStore,
    private sink: NotificationSink,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: SubscriptionCheckerOptions = {}
  ) {
    this.pauseBetweenChecksMs = options.pauseBetweenChecksMs ?? 2000;
    this.maxResultsPerNotification = options.maxResultsPerNotification ?? 10;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check one subscription. Never rejects; a failed check reports zero new results.
   */
  async check(subscription: Subscription): Promise<CheckOutcome> {
    const { id, userId } = subscription;
    this.logger.info('Checking subscription', { subscriptionId: id, userId });

    try {
      const report = await this.pipeline.run({
        keywords: subscription.keywords,
        platforms: subscription.platforms,
        detail: subscription.detail,
      });

      const newResults: FilteredResult[] = [];
      const freshByPlatform = new Map<string, string[]>();
      for (const [platform, results] of Object.entries(report.resultsByPlatform)) {
        const fresh = await this.unseen(platform, results);
        if (fresh.length > 0) {
          freshByPlatform.set(platform, fresh.map((r) => r.url));
          newResults.push(...fresh);
        }
      }

      const checkedAt = this.clock();
      let notification: Notification | undefined;
      if (newResults.length > 0) {
        notification = this.buildNotification(subscription, newResults, checkedAt);
        await this.store.pushNotification(notification);
        for (const [platform, urls] of freshByPlatform) {
          await this.store.markSeen(platform, urls);
        }
      }

      await this.store.markChecked(userId, id, checkedAt);

      const notified = notification ? await this.deliver(notification) : false;

      this.metrics.incrementCounter('subscription_checks_total', { status: 'success' });
      this.logger.info('Subscription checked', {
        subscriptionId: id,
        newResults: newResults.length,
        notified,
      });

      return { subscriptionId: id, newResults: newResults.length, notified };
    } catch (error: unknown) {
      this.metrics.incrementCounter('subscription_checks_total', { status: 'error' });
      this.logger.error('Subscription check failed', {
        subscriptionId: id,
        userId,
        error: errorMessage(error),
      });
      return { subscriptionId: id, newResults: 0, notified: false };
    }
  }

  /**
   * Check every active subscription, one at a time with a pause in between
   */
  async checkAll(): Promise<CheckOutcome[]> {
    const subscriptions = await this.store.listActive();
    this.logger.info('Subscription check cycle started', { subscriptions: subscriptions.length });

    const outcomes: CheckOutcome[] = [];
    for (const [i, subscription] of subscriptions.entries()) {
      outcomes.push(await this.check(subscription));

      if (i < subscriptions.length - 1 && this.pauseBetweenChecksMs > 0) {
        await sleep(this.pauseBetweenChecksMs);
      }
    }

    this.logger.info('Subscription check cycle completed', {
      subscriptions: subscriptions.length,
      notified: outcomes.filter((o) => o.notified).length,
    });

    return outcomes;
  }

  private async unseen(platform: string, results: FilteredResult[]): Promise<FilteredResult[]> {
    const fresh: FilteredResult[] = [];
    const urls = new Set<string>();

    for (const result of results) {
      if (!result.url || urls.has(result.url)) continue;
      if (await this.store.hasSeen(platform, result.url)) continue;
      urls.add(result.url);
      fresh.push(result);
    }

    return fresh;
  }

  private buildNotification(
    subscription: Subscription,
    newResults: FilteredResult[],
    checkedAt: Date
  ): Notification {
    return {
      subscriptionId: subscription.id,
      userId: subscription.userId,
      email: subscription.email,
      keywords: subscription.keywords,
      platforms: subscription.platforms,
      newResultsCount: newResults.length,
      results: newResults.slice(0, this.maxResultsPerNotification),
      createdAt: checkedAt.toISOString(),
    };
  }

  private async deliver(notification: Notification): Promise<boolean> {
    try {
      await this.sink.deliver(notification);
      return true;
    } catch (error: unknown) {
      this.logger.error('Notification delivery failed', {
        subscriptionId: notification.subscriptionId,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
