// src/subscriptions/LogNotificationSink.ts

import type { Logger } from '../observability/Logger';
import type { Notification, NotificationSink } from './types';
import { renderNotificationEmail } from './NotificationRenderer';

/**
 * Writes notifications to the log instead of mailing them.
 * Default sink when no delivery channel is wired in.
 */
export class LogNotificationSink implements NotificationSink {
  constructor(private logger: Logger) {}

  async deliver(notification: Notification): Promise<void> {
    const email = renderNotificationEmail(notification);

    this.logger.info('Notification ready', {
      userId: notification.userId,
      subscriptionId: notification.subscriptionId,
      recipient: notification.email,
      subject: email.subject,
      newResultsCount: notification.newResultsCount,
    });
  }
}
