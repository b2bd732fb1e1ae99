import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { RateLookupResult } from '@stake-converter/schemas';
import { ProcessingFailure, StreamClosedError, StreamConnectError } from '../../errors';
import type { MessageStream } from '../../stream/message-stream';
import { ConnectionSupervisor } from '../connection-supervisor.service';
import { MessageProcessor, type RequestProcessor } from '../message-processor.service';
import { RetryBuffer } from '../retry-buffer';
import { FakeStream, HEARTBEAT, flush, requestFrame } from './fakes';

const supervisorOptions = {
  reconnectDelayMs: 2000,
  heartbeatIntervalMs: 1000,
  heartbeatTimeoutMultiple: 2,
  maxConsecutiveProcessingFailures: 3,
};

const REPLY_730 =
  '{"type":"message","id":730,"payload":{"marketId":123,"selectionId":456,"odds":1.5,"stake":162.00891,"currency":"EUR","date":"2023-05-18T21:32:42.324Z"}}';

describe('ConnectionSupervisor', () => {
  let streams: FakeStream[];
  let openStream: Mock<() => Promise<MessageStream>>;
  let retryBuffer: RetryBuffer;
  let lookup: Mock<(currency: string, date: string) => Promise<RateLookupResult>>;
  let processor: MessageProcessor;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    streams = [];
    openStream = vi.fn<() => Promise<MessageStream>>(async () => {
      const stream = new FakeStream();
      streams.push(stream);
      return stream;
    });
    retryBuffer = new RetryBuffer({ ttlMs: 60_000, maxSize: 100 });
    lookup = vi.fn<(currency: string, date: string) => Promise<RateLookupResult>>();
    lookup.mockResolvedValue({ status: 'found', rate: 1.2345 });
    processor = new MessageProcessor({ lookup }, retryBuffer, { targetCurrency: 'EUR', precision: 5 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createSupervisor(
    unitProcessor: RequestProcessor = processor,
    overrides: Partial<typeof supervisorOptions> = {}
  ): ConnectionSupervisor {
    return new ConnectionSupervisor(openStream, unitProcessor, retryBuffer, {
      ...supervisorOptions,
      ...overrides,
    });
  }

  it('should answer requests on the open stream and stop cleanly', async () => {
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    expect(supervisor.getCurrentState()).toBe('connected');
    streams[0].push(HEARTBEAT);
    streams[0].push(requestFrame(730));
    await flush();

    expect(streams[0].sentOfType('message')).toEqual([REPLY_730]);
    expect(streams[0].sentOfType('heartbeat')).toHaveLength(1);

    supervisor.stop();
    await expect(run).resolves.toBeUndefined();
    expect(supervisor.getCurrentState()).toBe('stopped');
    expect(streams[0].closeCalls).toBeGreaterThanOrEqual(1);
    expect(openStream).toHaveBeenCalledTimes(1);
  });

  it('should close the stream on heartbeat timeout and reconnect after the delay', async () => {
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    await vi.advanceTimersByTimeAsync(3000);
    expect(streams[0].isOpen()).toBe(false);
    expect(supervisor.getCurrentState()).toBe('waiting');
    expect(openStream).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    await flush();
    expect(openStream).toHaveBeenCalledTimes(2);
    expect(supervisor.getCurrentState()).toBe('connected');

    supervisor.stop();
    await run;
  });

  it('should replay a reply lost to a severed stream after reconnecting', async () => {
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    streams[0].failSend = (frame) =>
      frame.includes('"type":"message"') ? new StreamClosedError('Stream is closed') : null;
    streams[0].push(requestFrame(730));
    await flush();
    expect(retryBuffer.size).toBe(1);

    streams[0].end();
    await flush();
    expect(supervisor.getCurrentState()).toBe('waiting');

    await vi.advanceTimersByTimeAsync(2000);
    await flush(10);

    expect(openStream).toHaveBeenCalledTimes(2);
    expect(streams[1].sentOfType('message')).toEqual([REPLY_730]);
    expect(retryBuffer.size).toBe(0);

    supervisor.stop();
    await run;
  });

  it('should replay a reply requeued after the reconnect on the live stream', async () => {
    let releaseLookup: () => void = () => {};
    lookup.mockImplementationOnce(
      () =>
        new Promise<RateLookupResult>((resolve) => {
          releaseLookup = () => resolve({ status: 'found', rate: 1.2345 });
        })
    );
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    streams[0].push(requestFrame(730));
    await flush();
    streams[0].end();
    await flush();

    await vi.advanceTimersByTimeAsync(2000);
    await flush();
    expect(openStream).toHaveBeenCalledTimes(2);
    expect(supervisor.getCurrentState()).toBe('connected');

    releaseLookup();
    await flush(10);

    expect(streams[0].sent.filter((frame) => frame.includes('"id":730'))).toEqual([]);
    expect(streams[1].sentOfType('message')).toEqual([REPLY_730]);
    expect(retryBuffer.size).toBe(0);
    expect(openStream).toHaveBeenCalledTimes(2);

    supervisor.stop();
    await run;
  });

  it('should reconnect after a failed connection attempt', async () => {
    openStream.mockRejectedValueOnce(new StreamConnectError('Could not connect to ws://peer.test'));
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    expect(supervisor.getCurrentState()).toBe('waiting');
    expect(openStream).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    await flush();
    expect(openStream).toHaveBeenCalledTimes(2);
    expect(supervisor.getCurrentState()).toBe('connected');

    supervisor.stop();
    await run;
  });

  it('should reconnect when the stream fails while reading', async () => {
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    streams[0].fail(new StreamClosedError('socket hang up'));
    await flush();
    expect(supervisor.getCurrentState()).toBe('waiting');

    await vi.advanceTimersByTimeAsync(2000);
    await flush();
    expect(openStream).toHaveBeenCalledTimes(2);

    supervisor.stop();
    await run;
  });

  it('should terminate after repeated processing failures', async () => {
    const failing: RequestProcessor = {
      process: vi.fn(async () => {
        throw new ProcessingFailure('Processing transaction 1 failed');
      }),
    };
    openStream.mockImplementation(async () => {
      const stream = new FakeStream();
      streams.push(stream);
      stream.push(requestFrame(1));
      return stream;
    });
    const supervisor = createSupervisor(failing);

    const run = expect(supervisor.run()).rejects.toThrow('3 consecutive processing failures');
    await flush();
    await vi.advanceTimersByTimeAsync(2000);
    await flush();
    await vi.advanceTimersByTimeAsync(2000);
    await flush();

    await run;
    expect(openStream).toHaveBeenCalledTimes(3);
    expect(supervisor.getCurrentState()).toBe('terminated');
  });

  it('should count a unit that fails after its session ended', async () => {
    let failUnit: (error: Error) => void = () => {};
    const lingering: RequestProcessor = {
      process: vi.fn(
        () =>
          new Promise<void>((_resolve, reject) => {
            failUnit = reject;
          })
      ),
    };
    const supervisor = createSupervisor(lingering, { maxConsecutiveProcessingFailures: 1 });
    const run = expect(supervisor.run()).rejects.toThrow('1 consecutive processing failures');
    await flush();

    streams[0].push(requestFrame(1));
    await flush();
    streams[0].end();
    await flush();
    expect(supervisor.getCurrentState()).toBe('waiting');

    failUnit(new ProcessingFailure('Processing transaction 1 failed'));
    await flush();
    expect(supervisor.getCurrentState()).toBe('waiting');

    await vi.advanceTimersByTimeAsync(2000);
    await run;
    expect(supervisor.getCurrentState()).toBe('terminated');
    expect(openStream).toHaveBeenCalledTimes(1);
  });

  it('should terminate on an unexpected connection error', async () => {
    openStream.mockRejectedValueOnce(new Error('invalid url'));
    const supervisor = createSupervisor();

    await expect(supervisor.run()).rejects.toThrow('invalid url');
    expect(supervisor.getCurrentState()).toBe('terminated');
  });

  it('should wait for in-flight requests before resolving on stop', async () => {
    let release: () => void = () => {};
    const slow: RequestProcessor = {
      process: vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      ),
    };
    const supervisor = createSupervisor(slow);
    let finished = false;
    const run = supervisor.run().then(() => {
      finished = true;
    });
    await flush();

    streams[0].push(requestFrame(1));
    await flush();
    expect(supervisor.inFlight).toBe(1);

    supervisor.stop();
    await flush();
    expect(finished).toBe(false);

    release();
    await run;
    expect(finished).toBe(true);
    expect(supervisor.inFlight).toBe(0);
  });

  it('should record its state transitions', async () => {
    const supervisor = createSupervisor();
    const run = supervisor.run();
    await flush();

    supervisor.stop();
    await run;

    expect(supervisor.getTransitionHistory().map(({ from, to }) => `${from}->${to}`)).toEqual([
      'idle->connecting',
      'connecting->connected',
      'connected->closing',
      'closing->stopped',
    ]);
  });
});
