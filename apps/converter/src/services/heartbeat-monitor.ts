import { HEARTBEAT_FRAME } from '@stake-converter/schemas';
import { createLogger, sleep } from '@stake-converter/utils';
import { StreamError } from '../errors';
import type { MessageStream } from '../stream/message-stream';

const logger = createLogger('converter:heartbeat');

/**
 * How a heartbeat run ended. Only an external `stop()` yields `stopped`.
 */
export type HeartbeatOutcome = 'stopped' | 'timeout' | 'stream-error';

export interface HeartbeatMonitorOptions {
  intervalMs: number;
  /** Peer is declared dead after `intervalMs * timeoutMultiple` of silence */
  timeoutMultiple: number;
  now?: () => number;
}

/**
 * Sends a heartbeat every interval and closes the stream when the peer's
 * heartbeats stop arriving.
 */
export class HeartbeatMonitor {
  private readonly now: () => number;
  private readonly controller = new AbortController();
  private lastReceivedAt: number;

  constructor(
    private stream: MessageStream,
    private options: HeartbeatMonitorOptions
  ) {
    this.now = options.now ?? (() => Date.now());
    this.lastReceivedAt = this.now();
  }

  /**
   * Record a heartbeat from the peer
   */
  markReceived(): void {
    this.lastReceivedAt = this.now();
  }

  stop(): void {
    this.controller.abort();
  }

  get running(): boolean {
    return !this.controller.signal.aborted;
  }

  /**
   * Run until stopped, timed out, or the stream fails
   *
   * Rejects only on errors that are not stream failures.
   */
  async run(): Promise<HeartbeatOutcome> {
    const { signal } = this.controller;
    const timeoutMs = this.options.intervalMs * this.options.timeoutMultiple;

    while (!signal.aborted) {
      try {
        await this.stream.send(HEARTBEAT_FRAME);
      } catch (error) {
        if (signal.aborted) break;
        if (!(error instanceof StreamError)) throw error;

        logger.warn({ error: error.message }, 'Heartbeat send failed, closing connection');
        await this.shutdown();
        return 'stream-error';
      }

      await sleep(this.options.intervalMs, signal);
      if (signal.aborted) break;

      const silentForMs = this.now() - this.lastReceivedAt;
      if (silentForMs > timeoutMs) {
        logger.warn({ silentForMs, timeoutMs }, 'Heartbeat timeout, closing connection');
        await this.shutdown();
        return 'timeout';
      }
    }

    return 'stopped';
  }

  private async shutdown(): Promise<void> {
    this.stop();
    try {
      await this.stream.close();
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Error while closing stream'
      );
    }
  }
}
