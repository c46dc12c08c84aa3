/**
 * Dependency Health Manager
 *
 * Per-dependency circuit breakers + health monitoring.
 */

import { DependencyName, DependencyHealth, DependencyStatus, DegradationLevel } from './types';
import { logger } from '../observability/logger';

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_CIRCUIT_RESET_MS = 30_000;

const DEPENDENCIES: DependencyName[] = ['semantic_store', 'identity_directory', 'embedding'];

export class DependencyHealthManager {
  private readonly deps = new Map<DependencyName, DependencyHealth>();
  private readonly log = logger.child({ component: 'dep-health' });

  constructor(
    private readonly failureThreshold = DEFAULT_FAILURE_THRESHOLD,
    private readonly circuitResetMs = DEFAULT_CIRCUIT_RESET_MS,
    private readonly now: () => number = Date.now,
  ) {
    for (const name of DEPENDENCIES) {
      this.deps.set(name, {
        name,
        status: 'healthy',
        lastCheck: this.now(),
        consecutiveFailures: 0,
        circuitOpen: false,
      });
    }
  }

  /** Record a successful call */
  recordSuccess(name: DependencyName): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    if (dep.status !== 'healthy') {
      this.log.info({ dependency: name }, 'Dependency recovered');
    }
    dep.consecutiveFailures = 0;
    dep.status = 'healthy';
    dep.lastCheck = this.now();
    dep.circuitOpen = false;
    dep.circuitOpenUntil = undefined;
    dep.lastError = undefined;
  }

  /** Record a failed call */
  recordFailure(name: DependencyName, error: string): void {
    const dep = this.deps.get(name);
    if (!dep) return;
    dep.consecutiveFailures++;
    dep.lastCheck = this.now();
    dep.lastError = error;

    if (dep.consecutiveFailures >= this.failureThreshold) {
      if (!dep.circuitOpen) {
        this.log.warn({ dependency: name, failures: dep.consecutiveFailures }, 'Circuit opened');
      }
      dep.status = 'down';
      dep.circuitOpen = true;
      dep.circuitOpenUntil = this.now() + this.circuitResetMs;
    } else if (dep.consecutiveFailures >= Math.floor(this.failureThreshold / 2)) {
      dep.status = 'degraded';
    }
  }

  /** Check if a dependency is available (circuit closed or half-open) */
  isAvailable(name: DependencyName): boolean {
    const dep = this.deps.get(name);
    if (!dep) return true;

    if (!dep.circuitOpen) return true;

    // Half-open: let one trial call through
    if (dep.circuitOpenUntil && this.now() > dep.circuitOpenUntil) {
      dep.circuitOpen = false;
      dep.status = 'degraded';
      return true;
    }

    return false;
  }

  getStatus(name: DependencyName): DependencyHealth | undefined {
    return this.deps.get(name);
  }

  getAllStatuses(): DependencyHealth[] {
    return Array.from(this.deps.values());
  }

  /** Get overall degradation level */
  getDegradationLevel(): DegradationLevel {
    const statuses = this.getAllStatuses();
    const downCount = statuses.filter((d) => d.status === 'down').length;
    const degradedCount = statuses.filter((d) => d.status === 'degraded').length;

    if (downCount >= 2) return 'full';
    if (downCount > 0 || degradedCount >= 2) return 'partial';
    return 'none';
  }

  /** Get health summary for /ready endpoint */
  getHealthSummary(): Record<string, { status: DependencyStatus; circuitOpen: boolean; failures: number }> {
    const summary: Record<string, { status: DependencyStatus; circuitOpen: boolean; failures: number }> = {};
    for (const dep of this.deps.values()) {
      summary[dep.name] = {
        status: dep.status,
        circuitOpen: dep.circuitOpen,
        failures: dep.consecutiveFailures,
      };
    }
    return summary;
  }
}
