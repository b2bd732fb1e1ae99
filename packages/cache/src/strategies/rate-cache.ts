import { RateSchema, type RateTable } from '@stake-converter/schemas';
import { createLogger } from '@stake-converter/utils';
import { rateTableKey } from '../keys';
import type { RedisClient } from '../client';

const logger = createLogger('cache:rates');

/**
 * Outcome of reading one currency from a cached day table
 *
 * `unsupported` means the day's table is cached but has no entry for the
 * currency; `miss` means the table has not been fetched (or the value was unusable).
 */
export type CachedRate = { status: 'hit'; rate: number } | { status: 'unsupported' } | { status: 'miss' };

/**
 * Storage for daily rate tables
 */
export interface RateTableCache {
  getRate(date: string, currency: string): Promise<CachedRate>;
  storeTable(date: string, table: RateTable): Promise<void>;
}

/** Reply shape of `MULTI ... EXEC` in ioredis */
export type TransactionReplies = Array<[error: Error | null, result: unknown]> | null;

/**
 * Interpret the replies of `MULTI HGET key currency; EXISTS key; EXEC`
 */
export function readRateReplies(replies: TransactionReplies): CachedRate {
  if (!replies) {
    throw new Error('Redis transaction was aborted');
  }

  const [fieldReply, existsReply] = replies;
  if (!fieldReply || !existsReply) {
    throw new Error(`Expected 2 transaction replies, got ${replies.length}`);
  }
  for (const [error] of replies) {
    if (error) throw error;
  }

  const [, value] = fieldReply;
  if (typeof value === 'string') {
    const rate = RateSchema.safeParse(Number(value));
    if (rate.success) {
      return { status: 'hit', rate: rate.data };
    }
    logger.warn({ value }, 'Ignoring unusable cached rate');
    return { status: 'miss' };
  }

  const [, exists] = existsReply;
  return exists === 1 ? { status: 'unsupported' } : { status: 'miss' };
}

/**
 * Rate table caching strategy using Redis hashes
 *
 * One hash per (target currency, day). Reads and writes each run in a single
 * MULTI so a table is never seen half-written or without its TTL.
 */
export class RateCacheStrategy implements RateTableCache {
  constructor(
    private redis: RedisClient,
    private targetCurrency: string,
    private ttlSeconds: number
  ) {}

  /**
   * Get one currency's rate for a day
   */
  async getRate(date: string, currency: string): Promise<CachedRate> {
    const key = rateTableKey(this.targetCurrency, date);

    const replies = await this.redis.multi().hget(key, currency).exists(key).exec();
    const cached = readRateReplies(replies);

    logger.debug({ key, currency, status: cached.status }, 'Rate cache lookup');
    return cached;
  }

  /**
   * Store a whole day table with the configured TTL
   *
   * Empty tables are not written, so the day stays a miss rather than
   * turning every currency into `unsupported`.
   */
  async storeTable(date: string, table: RateTable): Promise<void> {
    const key = rateTableKey(this.targetCurrency, date);
    const currencies = Object.keys(table).length;

    if (currencies === 0) {
      logger.warn({ key }, 'Not caching empty rate table');
      return;
    }

    const replies = await this.redis.multi().hset(key, table).expire(key, this.ttlSeconds).exec();
    for (const [error] of replies ?? []) {
      if (error) throw error;
    }

    logger.info({ key, currencies, ttlSeconds: this.ttlSeconds }, 'Cached rate table');
  }
}
