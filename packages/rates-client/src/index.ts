/**
 * @stake-converter/rates-client
 *
 * REST client for the external daily rate source
 */

export * from './client';
export * from './errors';
