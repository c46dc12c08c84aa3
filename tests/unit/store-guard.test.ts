jest.mock('../../src/observability/logger', () => ({
  logger: {
    child: () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { StoreGuard } from '../../src/resilience/store-guard';
import { DependencyHealthManager } from '../../src/resilience/dependency-health';
import { StoreUnavailableError } from '../../src/errors/errors';

describe('StoreGuard', () => {
  let clock: number;
  let health: DependencyHealthManager;
  let guard: StoreGuard;

  beforeEach(() => {
    clock = 1_000_000;
    health = new DependencyHealthManager(2, 30_000, () => clock);
    guard = new StoreGuard(health, { timeoutMs: 50, retryBackoffMs: 0 });
  });

  it('should pass results through', async () => {
    expect(await guard.run('semantic_store', 'get', async () => 42)).toBe(42);
  });

  it('should retry a failed call once', async () => {
    const fn = jest.fn()
      .mockRejectedValueOnce(new Error('blip'))
      .mockResolvedValueOnce('ok');

    expect(await guard.run('semantic_store', 'get', fn)).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(health.getStatus('semantic_store')?.consecutiveFailures).toBe(0);
  });

  it('should give up after the retry with a typed error', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));

    const error = await guard.run('identity_directory', 'lookup', fn).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ dependency: 'identity_directory', operation: 'lookup' });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should time out a call that never answers', async () => {
    const never = () => new Promise<never>(() => undefined);
    await expect(guard.run('embedding', 'embed', never)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('should fail fast while the circuit is open and try again after the reset period', async () => {
    const failing = jest.fn().mockRejectedValue(new Error('down'));
    await guard.run('semantic_store', 'put', failing).catch(() => undefined);
    await guard.run('semantic_store', 'put', failing).catch(() => undefined);
    expect(health.getStatus('semantic_store')?.circuitOpen).toBe(true);

    const retried = jest.fn().mockResolvedValue('back');
    await expect(guard.run('semantic_store', 'put', retried)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(retried).not.toHaveBeenCalled();

    clock += 30_001;
    expect(await guard.run('semantic_store', 'put', retried)).toBe('back');
    expect(health.getStatus('semantic_store')?.status).toBe('healthy');
  });
});

describe('DependencyHealthManager', () => {
  it('should report degradation levels', () => {
    const health = new DependencyHealthManager(2, 30_000);
    expect(health.getDegradationLevel()).toBe('none');

    health.recordFailure('semantic_store', 'down');
    health.recordFailure('semantic_store', 'down');
    expect(health.getDegradationLevel()).toBe('partial');

    health.recordFailure('identity_directory', 'down');
    health.recordFailure('identity_directory', 'down');
    expect(health.getDegradationLevel()).toBe('full');
    expect(health.getHealthSummary().semantic_store).toEqual({ status: 'down', circuitOpen: true, failures: 2 });
  });
});
