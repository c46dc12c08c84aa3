import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),

  redis: {
    /** Empty means in-memory stores (dev/test) */
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'cce:'),
  },

  security: {
    /** Admin routes are refused while this is empty */
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  identity: {
    defaultCountryCode: optional('DEFAULT_COUNTRY_CODE', '1'),
    confidenceThreshold: optionalFloat('IDENTITY_CONFIDENCE_THRESHOLD', 0.8),
    /** Threshold used when ingesting interactions */
    ingestThreshold: optionalFloat('IDENTITY_INGEST_THRESHOLD', 0.7),
    nameMatchFloor: optionalInt('NAME_MATCH_FLOOR', 70),
    nameScanLimit: optionalInt('NAME_SCAN_LIMIT', 1000),
  },

  store: {
    timeoutMs: optionalInt('STORE_TIMEOUT_MS', 5000),
    retryBackoffMs: optionalInt('STORE_RETRY_BACKOFF_MS', 250),
    circuitFailureThreshold: optionalInt('STORE_CIRCUIT_FAILURES', 5),
    circuitResetMs: optionalInt('STORE_CIRCUIT_RESET_MS', 30_000),
  },

  profile: {
    cacheTtlSeconds: optionalInt('PROFILE_CACHE_TTL_SECONDS', 3600),
    historyLimit: optionalInt('PROFILE_HISTORY_LIMIT', 500),
  },

  scoring: {
    recencyDecayDays: optionalFloat('RECENCY_DECAY_DAYS', 30),
  },

  threading: {
    windowDays: optionalFloat('THREAD_WINDOW_DAYS', 7),
    activeDays: optionalInt('THREAD_ACTIVE_DAYS', 3),
  },

  context: {
    maxItems: optionalInt('CONTEXT_MAX_ITEMS', 10),
    windowDays: optionalInt('CONTEXT_WINDOW_DAYS', 90),
    chronologicalLimit: optionalInt('CONTEXT_CHRONOLOGICAL_LIMIT', 100),
    neighbourCount: optionalInt('CONTEXT_NEIGHBOUR_COUNT', 20),
    minSimilarity: optionalFloat('CONTEXT_MIN_SIMILARITY', 0.3),
  },

  keywords: {
    /** Empty means config/keyword-tables.yaml under the project root */
    tablesPath: optional('KEYWORD_TABLES_PATH', ''),
  },

  embedding: {
    openaiApiKey: optional('OPENAI_API_KEY', ''),
    model: optional('EMBEDDING_MODEL', 'text-embedding-3-small'),
    /** Dimension of the local hashing provider */
    dimension: optionalInt('EMBEDDING_DIMENSION', 256),
    timeoutMs: optionalInt('EMBEDDING_TIMEOUT_MS', 10_000),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
    maskIdentifiersInLogs: optionalBool('MASK_IDENTIFIERS_IN_LOGS', true),
  },
} as const;
