import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { StreamClosedError, StreamConnectError } from '../errors';
import { WebSocketStream } from './websocket-stream';

const options = { closeTimeoutMs: 500 };

describe('WebSocketStream', () => {
  let server: WebSocketServer;
  let url: string;
  let peer: Promise<WebSocket>;

  beforeEach(async () => {
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    peer = new Promise((resolve) => server.once('connection', resolve));
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (typeof address === 'string') {
      throw new Error(`Unexpected server address ${address}`);
    }
    url = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should deliver frames in both directions', async () => {
    const stream = await WebSocketStream.connect(url, options);
    const socket = await peer;
    const received = new Promise<string>((resolve) =>
      socket.once('message', (data) => resolve(data.toString()))
    );

    await stream.send('{"type":"heartbeat"}');
    expect(await received).toBe('{"type":"heartbeat"}');

    socket.send('{"type":"message","id":1}');
    socket.send('{"type":"heartbeat"}');
    const frames: string[] = [];
    for await (const frame of stream.frames()) {
      frames.push(frame);
      if (frames.length === 2) break;
    }
    expect(frames).toEqual(['{"type":"message","id":1}', '{"type":"heartbeat"}']);

    await stream.close();
  });

  it('should end the frame sequence when the peer closes', async () => {
    const stream = await WebSocketStream.connect(url, options);
    const socket = await peer;

    socket.send('last');
    socket.close(1000);
    const frames: string[] = [];
    for await (const frame of stream.frames()) {
      frames.push(frame);
    }

    expect(frames).toEqual(['last']);
    expect(stream.isOpen()).toBe(false);
  });

  it('should stop reading when the signal aborts', async () => {
    const stream = await WebSocketStream.connect(url, options);
    const controller = new AbortController();
    const frames: string[] = [];

    const reading = (async () => {
      for await (const frame of stream.frames(controller.signal)) {
        frames.push(frame);
      }
    })();
    controller.abort();
    await reading;

    expect(frames).toEqual([]);
    await stream.close();
  });

  it('should reject writes once closing has begun', async () => {
    const stream = await WebSocketStream.connect(url, options);

    const closing = stream.close();

    await expect(stream.send('{"type":"heartbeat"}')).rejects.toBeInstanceOf(StreamClosedError);
    await closing;
    expect(stream.isOpen()).toBe(false);
  });

  it('should fail to connect when nothing is listening', async () => {
    const closedUrl = url;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = new WebSocketServer({ noServer: true });

    await expect(WebSocketStream.connect(closedUrl, options)).rejects.toBeInstanceOf(
      StreamConnectError
    );
  });
});
