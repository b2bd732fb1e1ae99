import { createLogger, yieldToEventLoop } from '@stake-converter/utils';

const logger = createLogger('converter:retry');

/**
 * A request whose reply could not be delivered
 */
export interface PendingRetry {
  /** Original raw frame */
  payload: string;
  /** Epoch ms when it was queued */
  enqueuedAt: number;
}

export interface RetryBufferOptions {
  /** Entries older than this are dropped instead of retried */
  ttlMs: number;
  /** Oldest entries are dropped beyond this size */
  maxSize: number;
  now?: () => number;
}

export interface DrainResult {
  retried: number;
  expired: number;
}

/**
 * FIFO of requests to replay after the next reconnect
 */
export class RetryBuffer {
  private entries: PendingRetry[] = [];
  private listeners: Set<() => void> = new Set();
  private readonly now: () => number;

  constructor(private options: RetryBufferOptions) {
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.entries.length;
  }

  put(payload: string): void {
    if (this.entries.length >= this.options.maxSize) {
      const dropped = this.entries.shift();
      logger.warn(
        { maxSize: this.options.maxSize, droppedEnqueuedAt: dropped?.enqueuedAt },
        'Retry buffer full, dropping oldest entry'
      );
    }

    this.entries.push({ payload, enqueuedAt: this.now() });
    logger.info({ size: this.entries.length }, 'Queued request for retry');

    for (const listener of this.listeners) {
      listener();
    }
  }

  /**
   * Call `listener` after every `put`
   *
   * @returns a function that removes the listener
   */
  onRequeue(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Hand every live entry to `submit`, oldest first, and discard expired ones
   *
   * Only the entries present when draining starts are processed; anything
   * requeued meanwhile waits for the next drain.
   */
  async drainAndRetry(submit: (payload: string) => void): Promise<DrainResult> {
    const batch = this.entries.splice(0);
    const result: DrainResult = { retried: 0, expired: 0 };

    for (const entry of batch) {
      const ageMs = this.now() - entry.enqueuedAt;
      if (ageMs > this.options.ttlMs) {
        result.expired++;
        logger.info({ ageMs, ttlMs: this.options.ttlMs }, 'Dropping expired retry');
      } else {
        submit(entry.payload);
        result.retried++;
      }
      await yieldToEventLoop();
    }

    if (batch.length > 0) {
      logger.info({ ...result }, 'Drained retry buffer');
    }
    return result;
  }
}
