#!/usr/bin/env tsx

/**
 * Subscription checker process
 *
 * Loads configuration from the environment (and .env), runs one check cycle
 * immediately, then follows the configured cron schedule until SIGINT/SIGTERM.
 *
 * Usage:
 *   tsx scripts/run-checker.ts
 *   npm run checker
 */

import { IssueRadar } from '../src/sdk';
import { loadConfigFromEnv } from '../src/config/env';

async function main(): Promise<void> {
  const radar = await IssueRadar.init(loadConfigFromEnv());
  const scheduler = radar.createScheduler();

  scheduler.start({ runImmediately: true });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down...`);
    scheduler.stop();
    radar
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error instanceof Error ? error.message : error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Subscription checker failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
