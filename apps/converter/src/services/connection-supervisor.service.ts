import {
  SUPERVISOR_TRANSITIONS,
  isHeartbeatFrame,
  type SupervisorState,
} from '@stake-converter/schemas';
import { createLogger, firstSettled, sleep } from '@stake-converter/utils';
import { ProcessingFailure, StreamError } from '../errors';
import type { MessageStream, StreamFactory } from '../stream/message-stream';
import { HeartbeatMonitor, type HeartbeatOutcome } from './heartbeat-monitor';
import type { RequestProcessor } from './message-processor.service';
import type { RetryBuffer } from './retry-buffer';
import { TaskGroup } from './task-group';

const logger = createLogger('converter:supervisor');

export interface ConnectionSupervisorOptions {
  reconnectDelayMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMultiple: number;
  /** Failed units, with no connectivity outcome in between, before giving up */
  maxConsecutiveProcessingFailures: number;
  now?: () => number;
}

/**
 * Why a session ended
 */
export type SessionOutcome =
  | { kind: 'stopped' }
  | { kind: 'connectivity'; reason: 'connect-failed' | 'heartbeat-timeout' | 'stream-error' | 'stream-ended' }
  | { kind: 'processing-failure'; error: ProcessingFailure };

interface TransitionRecord {
  from: SupervisorState;
  to: SupervisorState;
  at: string;
}

const MAX_HISTORY = 50;

function heartbeatToOutcome(outcome: HeartbeatOutcome): SessionOutcome {
  switch (outcome) {
    case 'stopped':
      return { kind: 'stopped' };
    case 'timeout':
      return { kind: 'connectivity', reason: 'heartbeat-timeout' };
    case 'stream-error':
      return { kind: 'connectivity', reason: 'stream-error' };
    default: {
      const _exhaustive: never = outcome;
      return _exhaustive;
    }
  }
}

function toProcessingFailure(error: unknown): ProcessingFailure {
  return error instanceof ProcessingFailure
    ? error
    : new ProcessingFailure('Processing unit failed', { cause: error });
}

/**
 * ConnectionSupervisor
 *
 * Owns the single live stream. Each session opens a stream, runs the
 * heartbeat and the dispatch loop side by side, replays the retry buffer
 * (at the start and whenever a reply is requeued while the stream is open),
 * and ends when the first of heartbeat, dispatch loop or a failed
 * processing unit finishes. Connectivity problems lead to a reconnect after
 * a fixed delay; repeated unit failures and anything unexpected terminate
 * the supervisor.
 */
export class ConnectionSupervisor {
  private currentState: SupervisorState = 'idle';
  private transitionHistory: TransitionRecord[] = [];
  private readonly units: TaskGroup;
  private readonly stopController = new AbortController();
  private currentSession: AbortController | null = null;
  private consecutiveProcessingFailures = 0;
  private lastProcessingFailure: ProcessingFailure | null = null;
  private readonly now: () => number;

  constructor(
    private openStream: StreamFactory,
    private processor: RequestProcessor,
    private retryBuffer: RetryBuffer,
    private options: ConnectionSupervisorOptions
  ) {
    this.now = options.now ?? (() => Date.now());
    this.units = new TaskGroup(this.now);
  }

  getCurrentState(): SupervisorState {
    return this.currentState;
  }

  /**
   * Get a copy of the transition history (most recent last).
   */
  getTransitionHistory(): TransitionRecord[] {
    return [...this.transitionHistory];
  }

  /**
   * Number of processing units still running
   */
  get inFlight(): number {
    return this.units.size;
  }

  /**
   * Run sessions until stopped
   *
   * Resolves after `stop()`; rejects when the supervisor terminates.
   */
  async run(): Promise<void> {
    try {
      while (!this.stopController.signal.aborted) {
        const outcome = await this.runSession();
        if (outcome.kind === 'stopped') {
          break;
        }

        if (outcome.kind === 'processing-failure') {
          this.recordProcessingFailure(outcome.error);
          logger.exception(outcome.error, 'Session ended by a failed processing unit', {
            consecutive: this.consecutiveProcessingFailures,
          });
        }
        this.checkFailureBudget();

        if (outcome.kind === 'connectivity') {
          this.consecutiveProcessingFailures = 0;
          logger.warn({ reason: outcome.reason }, 'Connection lost');
        }

        this.transition('waiting');
        logger.info({ delayMs: this.options.reconnectDelayMs }, 'Reconnecting after delay');
        await sleep(this.options.reconnectDelayMs, this.stopController.signal);
        this.checkFailureBudget();
      }
    } catch (error) {
      this.transition('terminated');
      logger.exception(error, 'Connection supervisor terminated');
      logger.fatal({ inFlight: this.units.size }, 'Fatal internal service error. Shutting down.');
      throw error;
    }

    this.transition('stopped');
    logger.info({ inFlight: this.units.size }, 'Waiting for in-flight requests');
    await this.units.settle();
    logger.info('Connection supervisor stopped');
  }

  /**
   * End the current session and stop reconnecting; `run()` resolves once
   * in-flight units have finished.
   */
  stop(): void {
    if (this.stopController.signal.aborted) return;
    logger.info({ state: this.currentState }, 'Stop requested');
    this.stopController.abort();
    this.currentSession?.abort();
  }

  private async runSession(): Promise<SessionOutcome> {
    this.transition('connecting');

    let stream: MessageStream;
    try {
      stream = await this.openStream();
    } catch (error) {
      if (!(error instanceof StreamError)) throw error;
      logger.warn({ error: error.message }, 'Could not open stream');
      return { kind: 'connectivity', reason: 'connect-failed' };
    }

    if (this.stopController.signal.aborted) {
      await this.closeStream(stream);
      return { kind: 'stopped' };
    }

    this.transition('connected');
    const session = new AbortController();
    this.currentSession = session;

    const heartbeat = new HeartbeatMonitor(stream, {
      intervalMs: this.options.heartbeatIntervalMs,
      timeoutMultiple: this.options.heartbeatTimeoutMultiple,
      now: this.now,
    });

    const spawnUnit = (raw: string) => {
      this.units.spawn(
        () => this.processor.process(raw, stream),
        (error) => this.reportUnitFailure(error)
      );
    };

    let replaying = false;
    let replayRequested = false;
    let replayTask: Promise<void> = Promise.resolve();
    const nextReplay = (): boolean => {
      const requested = replayRequested;
      replayRequested = false;
      replaying = requested;
      return requested;
    };
    const replay = (): void => {
      replayRequested = true;
      if (replaying) return;
      replaying = true;
      replayTask = this.replayRetries(stream, session.signal, spawnUnit, nextReplay).catch(
        (error: unknown) => {
          replaying = false;
          this.reportUnitFailure(error);
        }
      );
    };
    const stopReplaying = this.retryBuffer.onRequeue(replay);

    const interrupted = new Promise<SessionOutcome>((resolve) => {
      session.signal.addEventListener(
        'abort',
        () => {
          const reason: unknown = session.signal.reason;
          resolve(
            reason instanceof ProcessingFailure
              ? { kind: 'processing-failure', error: reason }
              : { kind: 'stopped' }
          );
        },
        { once: true }
      );
    });

    const heartbeatTask = heartbeat.run().then(heartbeatToOutcome);
    const dispatchTask = this.dispatch(stream, heartbeat, session.signal, spawnUnit);
    const winner = firstSettled([heartbeatTask, dispatchTask, interrupted]);
    replay();

    const { result } = await winner;

    this.transition('closing');
    stopReplaying();
    heartbeat.stop();
    session.abort();
    await Promise.allSettled([heartbeatTask, dispatchTask, replayTask]);
    await this.closeStream(stream);
    this.currentSession = null;

    const oldest = this.units.oldestStartedAt();
    logger.info(
      { inFlight: this.units.size, oldestUnitAgeMs: oldest === null ? null : this.now() - oldest },
      'Session ended'
    );

    if (result.status === 'rejected') {
      throw result.reason;
    }
    return result.value;
  }

  /**
   * Read frames in arrival order until the stream ends or the session is over
   */
  private async dispatch(
    stream: MessageStream,
    heartbeat: HeartbeatMonitor,
    signal: AbortSignal,
    spawnUnit: (raw: string) => void
  ): Promise<SessionOutcome> {
    try {
      for await (const raw of stream.frames(signal)) {
        if (isHeartbeatFrame(raw)) {
          heartbeat.markReceived();
        } else {
          spawnUnit(raw);
        }
      }
    } catch (error) {
      if (!(error instanceof StreamError)) throw error;
      logger.warn({ error: error.message }, 'Stream failed while reading');
      return { kind: 'connectivity', reason: 'stream-error' };
    }

    return signal.aborted ? { kind: 'stopped' } : { kind: 'connectivity', reason: 'stream-ended' };
  }

  /**
   * Drain the retry buffer into `stream` for as long as `next()` reports a
   * pending request, skipping drains once the stream is no longer usable
   */
  private async replayRetries(
    stream: MessageStream,
    signal: AbortSignal,
    spawnUnit: (raw: string) => void,
    next: () => boolean
  ): Promise<void> {
    while (next()) {
      if (signal.aborted || !stream.isOpen()) continue;

      const drained = await this.retryBuffer.drainAndRetry(spawnUnit);
      if (drained.retried > 0) {
        logger.info({ ...drained }, 'Replayed queued requests on live connection');
      }
    }
  }

  /**
   * A failed unit ends the live session; once no session is live it still
   * counts toward the failure budget.
   */
  private reportUnitFailure(error: unknown): void {
    const failure = toProcessingFailure(error);
    const session = this.currentSession;
    if (session && !session.signal.aborted) {
      session.abort(failure);
      return;
    }

    this.recordProcessingFailure(failure);
    logger.exception(failure, 'Processing unit failed after its session ended', {
      consecutive: this.consecutiveProcessingFailures,
    });
  }

  private recordProcessingFailure(failure: ProcessingFailure): void {
    this.consecutiveProcessingFailures++;
    this.lastProcessingFailure = failure;
  }

  /**
   * @throws ProcessingFailure once too many units failed in a row
   */
  private checkFailureBudget(): void {
    if (this.consecutiveProcessingFailures < this.options.maxConsecutiveProcessingFailures) {
      return;
    }
    throw new ProcessingFailure(
      `${this.consecutiveProcessingFailures} consecutive processing failures`,
      { cause: this.lastProcessingFailure }
    );
  }

  private async closeStream(stream: MessageStream): Promise<void> {
    try {
      await stream.close();
    } catch (error) {
      logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Error while closing stream'
      );
    }
  }

  /**
   * Move to a new state, validated against SUPERVISOR_TRANSITIONS
   *
   * @throws Error if the transition is not allowed from the current state.
   */
  private transition(to: SupervisorState): void {
    const from = this.currentState;
    const allowed: readonly SupervisorState[] = SUPERVISOR_TRANSITIONS[from];

    if (!allowed.includes(to)) {
      logger.error({ from, to }, 'Invalid state transition');
      throw new Error(`Invalid state transition: ${from} -> ${to}`);
    }

    this.transitionHistory.push({ from, to, at: new Date(this.now()).toISOString() });
    if (this.transitionHistory.length > MAX_HISTORY) {
      this.transitionHistory = this.transitionHistory.slice(-MAX_HISTORY);
    }

    this.currentState = to;
    logger.debug({ from, to }, 'State transition');
  }
}
