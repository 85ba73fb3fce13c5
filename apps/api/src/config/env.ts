import dotenv from 'dotenv';
dotenv.config();

/**
 * Get required environment variable
 * Throws in production if missing, returns empty string in development
 */
function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value && process.env.NODE_ENV === 'production') {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

/**
 * Get optional environment variable with default
 */
function optionalEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function optionalInt(key: string, defaultValue: number): number {
  const parsed = parseInt(optionalEnv(key, String(defaultValue)), 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export const config = {
  // === SERVER ===
  port: optionalInt('PORT', 3001),
  nodeEnv: optionalEnv('NODE_ENV', 'development'),
  isDev: optionalEnv('NODE_ENV', 'development') === 'development',
  isProd: process.env.NODE_ENV === 'production',
  logLevel: optionalEnv('LOG_LEVEL', 'info'),

  // === DATABASE ===
  databaseUrl: requireEnv('DATABASE_URL'),

  // === REDIS (event transport; in-process when absent) ===
  redis: {
    url: process.env.REDIS_URL,
    isConfigured: !!process.env.REDIS_URL,
  },

  // === PIPELINE ===
  pipeline: {
    processingTimeoutMs: optionalInt('WEBHOOK_PROCESSING_TIMEOUT_MS', 10000),
    maxWebhookRetries: optionalInt('WEBHOOK_MAX_RETRIES', 5),
    publishTimeoutMs: optionalInt('PUBLISH_TIMEOUT_MS', 5000),
    retryIntervalMs: optionalInt('WEBHOOK_RETRY_INTERVAL_MS', 60000),
    maxMessageWordCount: optionalInt('MAX_MESSAGE_WORD_COUNT', 1000),
  },
} as const;

// Type for the config object
export type Config = typeof config;

// Validate critical config on startup
export function validateConfig(log: (message: string) => void): void {
  const missing: string[] = [];

  if (!config.databaseUrl) missing.push('DATABASE_URL');

  if (missing.length > 0 && config.isProd) {
    throw new Error(
      `Missing critical environment variables: ${missing.join(', ')}`
    );
  }

  if (missing.length > 0) {
    log(`Missing environment variables: ${missing.join(', ')}`);
  }

  log(`Event transport: ${config.redis.isConfigured ? 'bullmq (redis)' : 'in-process'}`);
}
