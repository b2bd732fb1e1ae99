import { z } from 'zod';

const positiveInt = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default(fallback);

/**
 * Environment configuration schema
 * Validates all required environment variables on application startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Daily exchange rate source
  RATES_API_URL: z.string().url('Invalid rates API URL'),
  RATES_API_KEY: z.string().min(1, 'Rates API key is required'),
  RATES_API_TIMEOUT_MS: positiveInt('10000'),

  // Redis cache
  REDIS_URL: z.string().min(1, 'Redis connection string is required'),
  CACHE_TTL_SECONDS: positiveInt('86400'),

  // Peer stream carrying conversion requests
  REQUESTS_WS_URL: z
    .string()
    .url('Invalid requests WebSocket URL')
    .refine((val) => val.startsWith('ws://') || val.startsWith('wss://'), 'Requests URL must use ws:// or wss://'),

  // Replies that could not be delivered before a disconnect
  RETRY_MESSAGE_TTL_SECONDS: positiveInt('60'),
  RETRY_BUFFER_MAX_SIZE: positiveInt('10000'),

  // Logging (read directly by the logger; validated here so typos fail fast)
  LOG_EXPIRATION_DAYS: positiveInt('7'),
  LOG_EXCEPTION_FRAMES_LIMIT: positiveInt('10'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Hardcoded configuration values (not from environment variables)
 */
export const HARDCODED_CONFIG = {
  // Conversion
  conversion: {
    targetCurrency: 'EUR',
    precision: 5,
  },

  // Liveness protocol
  heartbeat: {
    intervalMs: 1000,
    // Tolerates one missed beat before declaring the peer dead
    timeoutMultiple: 2,
  },

  // Stream supervision
  websocket: {
    reconnectDelayMs: 2000,
    closeTimeoutMs: 1000,
    maxConsecutiveProcessingFailures: 3,
  },

  // Redis configuration
  redis: {
    maxRetries: 3,
    retryDelayMs: 1000,
    commandTimeoutMs: 5000,
  },

  // Rate source
  rates: {
    logBodyLimit: 512,
  },
} as const;
