/**
 * A bidirectional text-frame connection to the peer
 *
 * One instance per connection; a new one is opened on every reconnect.
 */
export interface MessageStream {
  /**
   * Write one frame
   *
   * Rejects with StreamClosedError once the stream is closing or closed.
   */
  send(frame: string): Promise<void>;

  /**
   * Inbound frames in arrival order
   *
   * Ends when the peer closes the stream or `signal` aborts; throws
   * StreamError when the connection fails.
   */
  frames(signal?: AbortSignal): AsyncIterable<string>;

  /** Close the stream; safe to call more than once */
  close(): Promise<void>;

  isOpen(): boolean;
}

/**
 * Opens a new stream, rejecting with StreamConnectError on failure
 */
export type StreamFactory = () => Promise<MessageStream>;
