/**
 * Store Guard
 *
 * Every call into a store goes through here: per-attempt timeout, a single
 * retry after a fixed backoff, then StoreUnavailableError. Outcomes feed the
 * dependency circuit breaker, and an open circuit fails fast.
 */

import { DependencyHealthManager } from './dependency-health';
import { DependencyName, StoreGuardConfig } from './types';
import { StoreUnavailableError } from '../errors/errors';
import { logger } from '../observability/logger';
import { storeCallFailures, storeRetries } from '../observability/metrics';

const DEFAULT_CONFIG: StoreGuardConfig = {
  timeoutMs: 5000,
  retryBackoffMs: 250,
};

export class StoreGuard {
  private readonly log = logger.child({ component: 'store-guard' });
  private readonly config: StoreGuardConfig;

  constructor(
    private readonly health: DependencyHealthManager,
    config?: Partial<StoreGuardConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async run<T>(dependency: DependencyName, operation: string, fn: () => Promise<T>): Promise<T> {
    if (!this.health.isAvailable(dependency)) {
      storeCallFailures.inc({ dependency, operation });
      throw new StoreUnavailableError(dependency, operation, new Error('circuit open'));
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        const result = await this.withTimeout(fn(), dependency, operation);
        this.health.recordSuccess(dependency);
        return result;
      } catch (err) {
        lastError = err;
        if (attempt === 1) {
          storeRetries.inc({ dependency, operation });
          this.log.warn({ err, dependency, operation }, 'Store call failed, retrying once');
          await this.delay(this.config.retryBackoffMs);
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : 'unknown error';
    this.health.recordFailure(dependency, message);
    storeCallFailures.inc({ dependency, operation });
    this.log.error({ err: lastError, dependency, operation }, 'Store unavailable');
    throw new StoreUnavailableError(dependency, operation, lastError);
  }

  private async withTimeout<T>(promise: Promise<T>, dependency: DependencyName, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${dependency}.${operation} timed out after ${this.config.timeoutMs}ms`)),
        this.config.timeoutMs,
      );
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Helper: async delay */
  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
