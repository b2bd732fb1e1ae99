import { z } from 'zod';

/**
 * A single conversion rate: units of the source currency per target unit
 */
export const RateSchema = z.number().finite().positive();

/**
 * One day's rates keyed by source currency code
 */
export const RateTableSchema = z.record(z.string(), RateSchema);

/**
 * Rate source `/historical` response
 *
 * @example { "data": { "2023-05-18": { "USD": 1.2345, "GBP": 0.8712 } } }
 */
export const HistoricalRatesResponseSchema = z.object({
  data: z.record(z.string(), RateTableSchema),
});

export type RateTable = z.infer<typeof RateTableSchema>;

/**
 * Result of looking a currency up in a day's rate table
 */
export type RateLookupResult = { status: 'found'; rate: number } | { status: 'unsupported' };
