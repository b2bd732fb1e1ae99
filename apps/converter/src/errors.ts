/**
 * Connectivity failure of the message stream; recovered by reconnecting
 */
export class StreamError extends Error {
  override name = 'StreamError';
}

/**
 * The stream could not be opened
 */
export class StreamConnectError extends StreamError {
  override name = 'StreamConnectError';
}

/**
 * A write was attempted on a stream that is closing or closed
 */
export class StreamClosedError extends StreamError {
  override name = 'StreamClosedError';
}

/**
 * A converted stake could not be computed
 */
export class ConversionError extends Error {
  override name = 'ConversionError';
}

/**
 * A processing unit failed unexpectedly; ends the current session
 */
export class ProcessingFailure extends Error {
  override name = 'ProcessingFailure';
}
