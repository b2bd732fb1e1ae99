/**
 * Plain-object form of an error, ready for a structured log entry
 */
export interface SerializedError {
  type: string;
  message: string;
  stack?: string;
  cause?: SerializedError | string;
}

/**
 * Serialize an error for logging, keeping at most `framesLimit` stack frames
 *
 * Non-Error values are stringified so callers can pass whatever a catch produced.
 */
export function serializeError(error: unknown, framesLimit: number): SerializedError {
  if (!(error instanceof Error)) {
    return { type: typeof error, message: String(error) };
  }

  const serialized: SerializedError = {
    type: error.name,
    message: error.message,
  };

  if (error.stack) {
    const [header, ...frames] = error.stack.split('\n');
    const kept = frames.filter((line) => line.trimStart().startsWith('at ')).slice(0, framesLimit);
    serialized.stack = [header, ...kept].join('\n');
  }

  if (error.cause !== undefined) {
    serialized.cause =
      error.cause instanceof Error ? serializeError(error.cause, framesLimit) : String(error.cause);
  }

  return serialized;
}
