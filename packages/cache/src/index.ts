/**
 * @stake-converter/cache
 *
 * Redis client and rate table caching
 */

export * from './client';
export * from './keys';
export * from './strategies/rate-cache';
