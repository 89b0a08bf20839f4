// src/subscriptions/SubscriptionScheduler.ts

import cron, { type ScheduledTask } from 'node-cron';
import type { Logger } from '../observability/Logger';
import type { SubscriptionChecker } from './SubscriptionChecker';
import type { CheckOutcome } from './types';
import { errorMessage } from '../utils/errors';

export interface SchedulerOptions {
  schedule?: string; // Cron expression, hourly by default
  timezone?: string;
}

/**
 * Runs `checkAll` on a cron schedule. A tick that fires while the previous
 * cycle is still running is skipped.
 */
export class SubscriptionScheduler {
  private task?: ScheduledTask;
  private running = false;
  private schedule: string;
  private timezone: string;

  constructor(
    private checker: Pick<SubscriptionChecker, 'checkAll'>,
    private logger: Logger,
    options: SchedulerOptions = {}
  ) {
    this.schedule = options.schedule ?? '0 * * * *';
    this.timezone = options.timezone ?? 'Etc/UTC';
  }

  start(options: { runImmediately?: boolean } = {}): void {
    if (this.task) return;

    this.task = cron.schedule(this.schedule, () => this.tick(), { timezone: this.timezone });
    this.logger.info('Subscription scheduler started', {
      schedule: this.schedule,
      timezone: this.timezone,
    });

    if (options.runImmediately) {
      this.tick();
    }
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = undefined;
    this.logger.info('Subscription scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one check cycle now. Resolves to undefined when a cycle is already
   * in progress or the cycle failed.
   */
  async runOnce(): Promise<CheckOutcome[] | undefined> {
    if (this.running) {
      this.logger.warn('Previous subscription check still running, skipping');
      return undefined;
    }

    this.running = true;
    try {
      return await this.checker.checkAll();
    } catch (error: unknown) {
      this.logger.error('Subscription check cycle failed', { error: errorMessage(error) });
      return undefined;
    } finally {
      this.running = false;
    }
  }

  private tick(): void {
    this.runOnce().catch((error: unknown) => {
      this.logger.error('Scheduled subscription check failed', { error: errorMessage(error) });
    });
  }
}
