/**
 * Why the rate source could not provide a day table
 *
 * - `unavailable`: network failure, timeout or non-2xx status
 * - `malformed`: the source answered, but not with a rate table
 */
export type RateSourceErrorKind = 'unavailable' | 'malformed';

/**
 * Failure of the external rate source
 */
export class RateSourceError extends Error {
  override name = 'RateSourceError';

  constructor(
    public readonly kind: RateSourceErrorKind,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
