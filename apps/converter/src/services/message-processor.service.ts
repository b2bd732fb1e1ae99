import { RateSourceError } from '@stake-converter/rates-client';
import {
  buildConversionReply,
  buildErrorFrame,
  extractTransactionId,
  parseConversionRequest,
  type ConversionRequest,
  type RateLookupResult,
} from '@stake-converter/schemas';
import { createLogger, roundTo } from '@stake-converter/utils';
import { ConversionError, ProcessingFailure, StreamError } from '../errors';
import type { MessageStream } from '../stream/message-stream';
import type { RateLookup } from './rate-cache.service';
import type { RetryBuffer } from './retry-buffer';

const logger = createLogger('converter:processor');

/** Error reply texts sent to the peer */
export const ERROR_MESSAGES = {
  remoteApi: 'Remote API exception.',
  unsupportedConversion: 'Unsupported exchange rate conversion',
  internal: 'Unexpected internal service error.',
  fatal: 'Fatal internal service error. Shutting down.',
} as const;

export interface MessageProcessorOptions {
  targetCurrency: string;
  /** Decimal places of the converted stake */
  precision: number;
}

/**
 * Anything that handles one inbound request frame
 */
export interface RequestProcessor {
  process(raw: string, stream: MessageStream): Promise<void>;
}

/**
 * Convert a stake into the target currency
 *
 * @throws ConversionError when the result is not a finite number
 */
export function convertStake(stake: number, rate: number, precision: number): number {
  const converted = roundTo(stake / rate, precision);
  if (!Number.isFinite(converted)) {
    throw new ConversionError(`Cannot convert stake ${stake} at rate ${rate}`);
  }
  return converted;
}

/**
 * Turns one request frame into exactly one reply frame
 *
 * Replies that cannot be written because the stream failed are queued for
 * retry instead. Unexpected failures are answered with a fatal error reply
 * and rethrown as ProcessingFailure.
 */
export class MessageProcessor implements RequestProcessor {
  constructor(
    private rates: RateLookup,
    private retryBuffer: RetryBuffer,
    private options: MessageProcessorOptions
  ) {}

  async process(raw: string, stream: MessageStream): Promise<void> {
    const parsed = parseConversionRequest(raw);
    if (!parsed.success) {
      const id = extractTransactionId(raw);
      logger.warn({ transactionId: id, reason: parsed.error }, 'Rejected invalid request');
      await this.reply(raw, stream, JSON.stringify(buildErrorFrame(id, parsed.error)));
      return;
    }

    const { request } = parsed;
    try {
      await this.reply(raw, stream, await this.convert(request));
    } catch (error) {
      logger.exception(error, 'Unexpected failure while processing request', {
        transactionId: request.transactionId,
      });
      await this.reply(
        raw,
        stream,
        JSON.stringify(buildErrorFrame(request.transactionId, ERROR_MESSAGES.fatal))
      ).catch((replyError: unknown) => {
        logger.exception(replyError, 'Could not send fatal error reply', {
          transactionId: request.transactionId,
        });
      });
      throw new ProcessingFailure(`Processing transaction ${request.transactionId} failed`, {
        cause: error,
      });
    }
  }

  /**
   * Build the reply frame for a valid request
   */
  private async convert(request: ConversionRequest): Promise<string> {
    const id = request.transactionId;

    let lookup: RateLookupResult;
    try {
      lookup = await this.rates.lookup(request.currency, request.effectiveDate);
    } catch (error) {
      if (!(error instanceof RateSourceError)) throw error;

      logger.exception(error, ERROR_MESSAGES.remoteApi, { transactionId: id });
      const message =
        error.kind === 'malformed'
          ? `${ERROR_MESSAGES.remoteApi} ${error.message}`
          : ERROR_MESSAGES.remoteApi;
      return JSON.stringify(buildErrorFrame(id, message));
    }

    if (lookup.status === 'unsupported') {
      logger.warn(
        { transactionId: id, currency: request.currency, date: request.effectiveDate },
        'Unsupported exchange rate conversion'
      );
      return JSON.stringify(
        buildErrorFrame(id, `${ERROR_MESSAGES.remoteApi} ${ERROR_MESSAGES.unsupportedConversion}`)
      );
    }

    let converted: number;
    try {
      converted = convertStake(request.stake, lookup.rate, this.options.precision);
    } catch (error) {
      if (!(error instanceof ConversionError)) throw error;

      logger.exception(error, ERROR_MESSAGES.internal, { transactionId: id });
      return JSON.stringify(buildErrorFrame(id, ERROR_MESSAGES.internal));
    }

    logger.debug(
      { transactionId: id, currency: request.currency, rate: lookup.rate, converted },
      'Converted stake'
    );
    return JSON.stringify(buildConversionReply(request, converted, this.options.targetCurrency));
  }

  /**
   * Write a reply, queueing the request for retry if the stream has failed
   */
  private async reply(raw: string, stream: MessageStream, frame: string): Promise<void> {
    try {
      await stream.send(frame);
    } catch (error) {
      if (!(error instanceof StreamError)) throw error;

      logger.warn(
        { transactionId: extractTransactionId(raw), error: error.message },
        'Connection failed while sending reply, scheduling retry'
      );
      this.retryBuffer.put(raw);
    }
  }
}
