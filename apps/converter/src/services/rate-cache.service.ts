import type { RateTableCache } from '@stake-converter/cache';
import type { RateSource } from '@stake-converter/rates-client';
import type { RateLookupResult, RateTable } from '@stake-converter/schemas';
import { createLogger } from '@stake-converter/utils';

const logger = createLogger('cache:rates');

/**
 * Anything that can resolve a currency's rate for a day
 */
export interface RateLookup {
  lookup(currency: string, date: string): Promise<RateLookupResult>;
}

/**
 * Cache-aside rate lookup
 *
 * Reads the day's table from the cache; on a miss, fetches the whole table
 * from the rate source and stores it before answering. Concurrent misses for
 * the same day share one fetch.
 */
export class RateCacheService implements RateLookup {
  private inFlight: Map<string, Promise<RateTable>> = new Map();

  constructor(
    private cache: RateTableCache,
    private source: RateSource
  ) {}

  /**
   * @throws RateSourceError when the table is not cached and the source fails
   */
  async lookup(currency: string, date: string): Promise<RateLookupResult> {
    const cached = await this.cache.getRate(date, currency);
    if (cached.status === 'hit') {
      return { status: 'found', rate: cached.rate };
    }
    if (cached.status === 'unsupported') {
      return { status: 'unsupported' };
    }

    const table = await this.loadTable(date);
    return Object.hasOwn(table, currency)
      ? { status: 'found', rate: table[currency] }
      : { status: 'unsupported' };
  }

  private loadTable(date: string): Promise<RateTable> {
    const pending = this.inFlight.get(date);
    if (pending) {
      logger.debug({ date }, 'Joining in-flight rate fetch');
      return pending;
    }

    const request = this.fetchAndStore(date).finally(() => this.inFlight.delete(date));
    this.inFlight.set(date, request);
    return request;
  }

  private async fetchAndStore(date: string): Promise<RateTable> {
    logger.info({ date }, 'Rate cache miss, fetching day table');
    const table = await this.source.getDailyRates(date);
    await this.cache.storeTable(date, table);
    return table;
  }
}
