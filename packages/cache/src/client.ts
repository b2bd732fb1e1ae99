import Redis from 'ioredis';
import { HARDCODED_CONFIG, type EnvConfig } from '@stake-converter/schemas';
import { createLogger } from '@stake-converter/utils';

const logger = createLogger('cache:redis');

/**
 * Replace any password in a Redis connection string so it can be logged
 *
 * @example redactRedisUrl('redis://:test-secret@localhost:6379/0') // 'redis://:****@localhost:6379/0'
 */
export function redactRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '****';
    }
    return parsed.toString();
  } catch {
    return '<unparseable redis url>';
  }
}

/**
 * Create a Redis client instance
 *
 * @param config - Validated environment configuration
 * @returns Redis client instance
 */
export function createRedisClient(config: EnvConfig): Redis {
  logger.info(`Redis target: ${redactRedisUrl(config.REDIS_URL)}`);

  const redis = new Redis(config.REDIS_URL, {
    maxRetriesPerRequest: HARDCODED_CONFIG.redis.maxRetries,
    retryStrategy: (times) => {
      if (times > HARDCODED_CONFIG.redis.maxRetries) {
        logger.error('Redis max retries reached');
        return null;
      }
      const delay = Math.min(times * HARDCODED_CONFIG.redis.retryDelayMs, 5000);
      logger.warn(`Redis retry attempt ${times}, waiting ${delay}ms`);
      return delay;
    },
    commandTimeout: HARDCODED_CONFIG.redis.commandTimeoutMs,
  });

  redis.on('connect', () => {
    logger.info('Redis client connected');
  });

  redis.on('ready', () => {
    logger.info('Redis client ready');
  });

  redis.on('error', (error) => {
    logger.error({ err: error }, 'Redis client error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  redis.on('reconnecting', () => {
    logger.info('Redis client reconnecting...');
  });

  return redis;
}

/**
 * Helper type for the Redis client
 */
export type RedisClient = Redis;

/**
 * Test Redis connection with PING command
 * Throws an error if connection fails
 */
export async function testRedisConnection(redis: RedisClient): Promise<void> {
  try {
    const result = await redis.ping();
    if (result !== 'PONG') {
      throw new Error(`Unexpected PING response: ${result}`);
    }
    logger.info('Redis connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Redis connection test FAILED');
    throw new Error(`Redis connection failed: ${message}`, { cause: error });
  }
}
