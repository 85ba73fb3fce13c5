// ============================================
// DATABASE CONFIGURATION
// ============================================

export const DB_CONFIG = {
  POOL_SIZE: 20,                 // Max concurrent connections
  IDLE_TIMEOUT_MS: 30000,        // 30 seconds idle timeout
  CONNECTION_TIMEOUT_MS: 10000,
} as const;

// ============================================
// PIPELINE CONFIGURATION
// ============================================

export const PIPELINE_CONFIG = {
  PREVIEW_MAX_LENGTH: 255,       // last_message_content preview
  RETRY_SWEEP_BATCH_SIZE: 100,
  RESOLVE_MAX_ATTEMPTS: 3,       // get-or-create rounds before giving up
  DEFAULT_FAILURE_REASON: 'Message delivery failed',
} as const;

// ============================================
// EVENT DEDUPLICATION
// ============================================

export const DEDUP_CONFIG = {
  MEMORY_MAX_ENTRIES: 100000,
  MEMORY_TTL_MS: 2 * 60 * 60 * 1000, // 2 hours
} as const;

// ============================================
// QUEUE CONFIGURATION
// ============================================

export const QUEUE_CONFIG = {
  // Retry settings
  MAX_RETRIES: 5,
  RETRY_BACKOFF_MS: 1000,        // Base for exponential backoff

  // Worker concurrency per topic
  WORKER_CONCURRENCY: 10,

  // Completed jobs kept for inspection
  KEEP_COMPLETED: 1000,
} as const;
