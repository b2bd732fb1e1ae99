import { z } from 'zod';

/**
 * Id used in error frames when the transaction id could not be recovered
 * from the offending frame
 */
export const MISSING_TRANSACTION_ID = '<missing_transaction_id>';

/**
 * Conversion request/reply payload
 *
 * `date` is an ISO-8601 timestamp; the peer sends it with milliseconds
 * and a trailing `Z`.
 */
export const ConversionPayloadSchema = z.object({
  marketId: z.number().int(),
  selectionId: z.number().int(),
  odds: z.number(),
  stake: z.number(),
  currency: z.string().regex(/^[A-Z]{3}$/, 'currency must be a 3-letter uppercase string'),
  date: z.string().datetime({ offset: true, message: 'date must be an ISO-8601 timestamp' }),
});

/**
 * Liveness frame exchanged in both directions
 */
export const HeartbeatFrameSchema = z.object({
  type: z.literal('heartbeat'),
});

/**
 * Conversion request (inbound) or converted reply (outbound)
 */
export const MessageFrameSchema = z.object({
  type: z.literal('message'),
  id: z.number().int(),
  payload: ConversionPayloadSchema,
});

/**
 * Error reply for a request that could not be converted
 */
export const ErrorFrameSchema = z.object({
  type: z.literal('error'),
  id: z.union([z.number().int(), z.literal(MISSING_TRANSACTION_ID)]),
  message: z.string(),
});

/**
 * Any frame carried by the stream
 */
export const StreamFrameSchema = z.discriminatedUnion('type', [
  HeartbeatFrameSchema,
  MessageFrameSchema,
  ErrorFrameSchema,
]);

// Export inferred TypeScript types
export type ConversionPayload = z.infer<typeof ConversionPayloadSchema>;
export type HeartbeatFrame = z.infer<typeof HeartbeatFrameSchema>;
export type MessageFrame = z.infer<typeof MessageFrameSchema>;
export type ErrorFrame = z.infer<typeof ErrorFrameSchema>;
export type StreamFrame = z.infer<typeof StreamFrameSchema>;
export type TransactionId = ErrorFrame['id'];

/**
 * Serialized heartbeat frame, built once
 */
export const HEARTBEAT_FRAME = JSON.stringify({ type: 'heartbeat' } satisfies HeartbeatFrame);

/**
 * Check whether a raw frame is a liveness frame
 */
export function isHeartbeatFrame(raw: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return false;
  }
  return HeartbeatFrameSchema.safeParse(parsed).success;
}
