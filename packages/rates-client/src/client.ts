import {
  HARDCODED_CONFIG,
  HistoricalRatesResponseSchema,
  type RateTable,
} from '@stake-converter/schemas';
import { createLogger } from '@stake-converter/utils';
import { RateSourceError } from './errors';

const logger = createLogger('rates:api');

/** Response bodies are cut to this many characters before logging */
const LOG_BODY_LIMIT = HARDCODED_CONFIG.rates.logBodyLimit;

/**
 * Anything that can produce a day's full rate table
 */
export interface RateSource {
  getDailyRates(date: string): Promise<RateTable>;
}

export interface RatesApiClientConfig {
  /** Base URL of the rate API, without the `/historical` path */
  baseUrl: string;
  apiKey: string;
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  /** Currency the returned rates are quoted against */
  baseCurrency: string;
}

function truncate(text: string, limit: number = LOG_BODY_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Rates API Client
 *
 * Fetches historical daily rate tables:
 * GET {baseUrl}/historical?apikey={key}&base_currency={currency}&date={YYYY-MM-DD}
 */
export class RatesApiClient implements RateSource {
  constructor(private config: RatesApiClientConfig) {}

  /**
   * Build the request URL, optionally with the API key masked for logging
   */
  buildUrl(date: string, redactKey: boolean = false): string {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, '')}/historical`);
    url.searchParams.set('apikey', redactKey ? '****' : this.config.apiKey);
    url.searchParams.set('base_currency', this.config.baseCurrency);
    url.searchParams.set('date', date);
    return url.toString();
  }

  /**
   * Fetch every rate for one day
   *
   * @throws RateSourceError
   */
  async getDailyRates(date: string): Promise<RateTable> {
    return logger.perf.track('rates.getDailyRates', () => this.fetchDailyRates(date), { date });
  }

  private async fetchDailyRates(date: string): Promise<RateTable> {
    const loggedUrl = this.buildUrl(date, true);
    logger.info({ url: loggedUrl }, 'Fetching daily rates');

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.buildUrl(date), {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ url: loggedUrl, reason }, 'Rate request failed');
      throw new RateSourceError('unavailable', `Rate request failed: ${reason}`, { cause: error });
    }

    logger.info(
      { url: loggedUrl, status: response.status, body: truncate(body) },
      'Received rate response'
    );

    if (!response.ok) {
      throw new RateSourceError('unavailable', `Rate API responded with status ${response.status}`);
    }

    return parseDailyRates(body);
  }
}

/**
 * Extract the day table from a `/historical` response body
 *
 * The source keys the table by the date it actually served, so the first
 * (and only) entry is taken whatever its key.
 *
 * @throws RateSourceError with kind `malformed`
 */
export function parseDailyRates(body: string): RateTable {
  const malformed = () =>
    new RateSourceError(
      'malformed',
      `Unknown format in remote API response: expected {"data": {<date>: {<currency>: <rate>}}}, got ${truncate(body)}`
    );

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw malformed();
  }

  const parsed = HistoricalRatesResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw malformed();
  }

  const [table] = Object.values(parsed.data.data);
  if (!table) {
    throw malformed();
  }
  return table;
}
