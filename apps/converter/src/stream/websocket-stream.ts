import WebSocket from 'ws';
import { createLogger } from '@stake-converter/utils';
import { StreamClosedError, StreamConnectError, StreamError } from '../errors';
import type { MessageStream } from './message-stream';

const logger = createLogger('converter:stream');

export interface WebSocketStreamOptions {
  /** Terminate the socket if the closing handshake takes longer than this */
  closeTimeoutMs: number;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * MessageStream over a `ws` client socket
 *
 * Inbound frames are queued as they arrive and handed out by `frames()`.
 */
export class WebSocketStream implements MessageStream {
  private queue: string[] = [];
  private waiters: Array<() => void> = [];
  private failure: StreamError | null = null;
  private ended = false;
  private closed: Promise<void> | null = null;

  private constructor(
    private ws: WebSocket,
    private url: string,
    private options: WebSocketStreamOptions
  ) {
    ws.on('message', (data) => {
      this.queue.push(rawDataToString(data));
      this.wake();
    });

    ws.on('error', (error) => {
      logger.error({ url, error: error.message }, 'WebSocket error');
      this.failure = new StreamError(`WebSocket error: ${error.message}`, { cause: error });
      this.wake();
    });

    ws.on('close', (code, reason) => {
      logger.warn({ url, code, reason: reason.toString() }, 'WebSocket connection closed');
      this.ended = true;
      this.wake();
    });
  }

  /**
   * Open a connection to `url`
   *
   * @throws StreamConnectError when the socket fails before it opens
   */
  static connect(url: string, options: WebSocketStreamOptions): Promise<WebSocketStream> {
    return new Promise((resolve, reject) => {
      logger.info({ url }, 'Connecting to WebSocket...');

      const ws = new WebSocket(url);

      const onError = (error: Error) => {
        reject(new StreamConnectError(`Could not connect to ${url}: ${error.message}`, { cause: error }));
      };
      const onClose = (code: number) => {
        reject(new StreamConnectError(`Connection to ${url} closed before opening (code ${code})`));
      };

      ws.on('error', onError);
      ws.once('close', onClose);
      ws.once('open', () => {
        ws.off('error', onError);
        ws.off('close', onClose);
        logger.info({ url }, 'Connected to WebSocket');
        resolve(new WebSocketStream(ws, url, options));
      });
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  isOpen(): boolean {
    return this.closed === null && this.failure === null && this.ws.readyState === WebSocket.OPEN;
  }

  send(frame: string): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new StreamClosedError(`Stream to ${this.url} is closed`));
    }

    return new Promise((resolve, reject) => {
      this.ws.send(frame, (error) => {
        if (error) {
          // A failed write leaves the socket unusable
          this.failure ??= new StreamError(`Write to ${this.url} failed: ${error.message}`, { cause: error });
          this.wake();
          reject(new StreamClosedError(`Write to ${this.url} failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  async *frames(signal?: AbortSignal): AsyncGenerator<string> {
    const onAbort = () => this.wake();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (!signal?.aborted) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (this.failure) {
          throw this.failure;
        }
        if (this.ended) {
          return;
        }
        await new Promise<void>((resolve) => this.waiters.push(resolve));
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  close(): Promise<void> {
    if (this.closed) {
      return this.closed;
    }

    this.closed = new Promise<void>((resolve) => {
      if (this.ws.readyState === WebSocket.CLOSED) {
        resolve();
        return;
      }

      const timer = setTimeout(() => {
        logger.warn({ url: this.url }, 'Close handshake timed out, terminating socket');
        this.ws.terminate();
        resolve();
      }, this.options.closeTimeoutMs);

      this.ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      this.ws.close(1000);
    });

    return this.closed;
  }
}
