import client from 'prom-client';

export const register = new client.Registry();

client.collectDefaultMetrics({ register, prefix: 'cce_' });

// ───── Identity ─────────────────────────────────────────────────

export const identityResolutions = new client.Counter({
  name: 'cce_identity_resolutions_total',
  help: 'Identity resolution attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const identityMerges = new client.Counter({
  name: 'cce_identity_merges_total',
  help: 'Identity merges by result',
  labelNames: ['result'] as const,
  registers: [register],
});

// ───── Profile cache ────────────────────────────────────────────

export const profileCacheHits = new client.Counter({
  name: 'cce_profile_cache_hits_total',
  help: 'Profile cache hits',
  registers: [register],
});

export const profileCacheMisses = new client.Counter({
  name: 'cce_profile_cache_misses_total',
  help: 'Profile cache misses',
  registers: [register],
});

export const profileRebuildDuration = new client.Histogram({
  name: 'cce_profile_rebuild_duration_seconds',
  help: 'Duration of profile rebuilds',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

// ───── Store ────────────────────────────────────────────────────

export const storeCallFailures = new client.Counter({
  name: 'cce_store_call_failures_total',
  help: 'Store calls that failed after retry',
  labelNames: ['dependency', 'operation'] as const,
  registers: [register],
});

export const storeRetries = new client.Counter({
  name: 'cce_store_retries_total',
  help: 'Store calls retried once after a failure',
  labelNames: ['dependency', 'operation'] as const,
  registers: [register],
});

export const malformedRecords = new client.Counter({
  name: 'cce_malformed_records_total',
  help: 'Records skipped because they could not be parsed',
  labelNames: ['source'] as const,
  registers: [register],
});

// ───── Context ──────────────────────────────────────────────────

export const contextRequests = new client.Counter({
  name: 'cce_context_requests_total',
  help: 'Context retrieval requests by status',
  labelNames: ['status'] as const,
  registers: [register],
});

export const contextDuration = new client.Histogram({
  name: 'cce_context_duration_seconds',
  help: 'Duration of context retrieval',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

export const httpRequestDuration = new client.Histogram({
  name: 'cce_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
