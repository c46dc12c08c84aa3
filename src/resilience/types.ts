/**
 * Dependency health types.
 */

import { StoreDependency } from '../errors/errors';

export type DependencyName = StoreDependency;

export type DependencyStatus = 'healthy' | 'degraded' | 'down';

export type DegradationLevel = 'none' | 'partial' | 'full';

export interface DependencyHealth {
  name: DependencyName;
  status: DependencyStatus;
  lastCheck: number;
  consecutiveFailures: number;
  lastError?: string;
  /** Circuit breaker: open = requests blocked */
  circuitOpen: boolean;
  circuitOpenUntil?: number;
}

export interface StoreGuardConfig {
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Fixed delay before the single retry */
  retryBackoffMs: number;
}
