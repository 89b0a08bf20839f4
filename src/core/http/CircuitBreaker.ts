// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';

export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();

  constructor(
    private logger: Logger,
    private threshold = 5,
    private resetTimeout = 60000 // 1 minute
  ) {}

  canExecute(target: string): boolean {
    const failures = this.failures.get(target) || 0;
    const lastFailure = this.lastFailureTime.get(target) || 0;

    if (failures >= this.threshold) {
      const timeSinceLastFailure = Date.now() - lastFailure;

      if (timeSinceLastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { target, failures });
        return false;
      }

      // Half-open: let one request through
      this.failures.set(target, 0);
    }

    return true;
  }

  recordSuccess(target: string): void {
    this.failures.set(target, 0);
  }

  recordFailure(target: string): void {
    const current = this.failures.get(target) || 0;
    this.failures.set(target, current + 1);
    this.lastFailureTime.set(target, Date.now());
  }
}
