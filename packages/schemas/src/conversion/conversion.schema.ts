import type { ZodIssue } from 'zod';
import {
  MISSING_TRANSACTION_ID,
  MessageFrameSchema,
  type ErrorFrame,
  type MessageFrame,
  type TransactionId,
} from '../stream/frame.schema';

/**
 * Validated conversion request, immutable once constructed
 */
export interface ConversionRequest {
  readonly transactionId: number;
  readonly marketId: number;
  readonly selectionId: number;
  readonly odds: number;
  readonly stake: number;
  /** Source currency (3-letter uppercase code) */
  readonly currency: string;
  /** Original request timestamp (ISO-8601) */
  readonly timestamp: string;
  /** Calendar date the rate applies to (YYYY-MM-DD, as written in the timestamp) */
  readonly effectiveDate: string;
}

export type ConversionRequestParseResult =
  | { success: true; request: ConversionRequest }
  | { success: false; error: string };

function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Parse and validate a raw inbound frame into a ConversionRequest
 *
 * Never throws: JSON and schema failures come back as a readable error string.
 */
export function parseConversionRequest(raw: string): ConversionRequestParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { success: false, error: 'Message could not be decoded as JSON' };
  }

  const result = MessageFrameSchema.safeParse(json);
  if (!result.success) {
    return {
      success: false,
      error: `Input validation issues - ${result.error.issues.map(formatIssue).join('; ')}`,
    };
  }

  const { id, payload } = result.data;
  const request: ConversionRequest = Object.freeze({
    transactionId: id,
    marketId: payload.marketId,
    selectionId: payload.selectionId,
    odds: payload.odds,
    stake: payload.stake,
    currency: payload.currency,
    timestamp: payload.date,
    effectiveDate: payload.date.slice(0, 10),
  });

  return { success: true, request };
}

/**
 * Best-effort recovery of the transaction id from a frame that failed validation
 *
 * Accepts numeric ids (truncated to an integer) and integral numeric strings;
 * anything else yields MISSING_TRANSACTION_ID.
 */
export function extractTransactionId(raw: string): TransactionId {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return MISSING_TRANSACTION_ID;
  }

  if (typeof json !== 'object' || json === null || !('id' in json)) {
    return MISSING_TRANSACTION_ID;
  }

  const { id } = json;
  if (typeof id === 'number' && Number.isFinite(id)) {
    return Math.trunc(id);
  }
  if (typeof id === 'string' && /^\s*[+-]?\d+\s*$/.test(id)) {
    return parseInt(id, 10);
  }
  return MISSING_TRANSACTION_ID;
}

/**
 * Build the success reply for a converted request
 *
 * The reply date is the request timestamp normalized to UTC with milliseconds.
 */
export function buildConversionReply(
  request: ConversionRequest,
  convertedStake: number,
  targetCurrency: string
): MessageFrame {
  return {
    type: 'message',
    id: request.transactionId,
    payload: {
      marketId: request.marketId,
      selectionId: request.selectionId,
      odds: request.odds,
      stake: convertedStake,
      currency: targetCurrency,
      date: new Date(request.timestamp).toISOString(),
    },
  };
}

/**
 * Build an error reply
 */
export function buildErrorFrame(id: TransactionId, message: string): ErrorFrame {
  return { type: 'error', id, message };
}
