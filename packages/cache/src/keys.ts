/**
 * Cache key builders for consistent key naming across the application
 */

/**
 * Build the cache key for one day's rate table into a target currency.
 * Stored as a hash: field = source currency, value = rate.
 *
 * @example rateTableKey('EUR', '2023-05-18') // 'rates:EUR:2023-05-18'
 */
export function rateTableKey(targetCurrency: string, date: string): string {
  return `rates:${targetCurrency}:${date}`;
}
