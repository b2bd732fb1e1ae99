import { describe, it, expect } from 'vitest';
import { serializeError } from './serialize-error';

function errorWithStack(message: string, frames: string[]): Error {
  const error = new Error(message);
  error.stack = [`Error: ${message}`, ...frames].join('\n');
  return error;
}

describe('serializeError', () => {
  it('should keep the header and at most the frame limit', () => {
    const error = errorWithStack('boom', [
      '    at first (a.ts:1:1)',
      '    at second (b.ts:2:2)',
      '    at third (c.ts:3:3)',
    ]);

    expect(serializeError(error, 2)).toEqual({
      type: 'Error',
      message: 'boom',
      stack: 'Error: boom\n    at first (a.ts:1:1)\n    at second (b.ts:2:2)',
    });
  });

  it('should serialize nested causes', () => {
    const inner = errorWithStack('socket hang up', []);
    const outer = new Error('fetch failed', { cause: inner });
    outer.stack = 'Error: fetch failed';

    expect(serializeError(outer, 5)).toEqual({
      type: 'Error',
      message: 'fetch failed',
      stack: 'Error: fetch failed',
      cause: { type: 'Error', message: 'socket hang up', stack: 'Error: socket hang up' },
    });
  });

  it('should use the subclass name as type', () => {
    class StreamClosed extends Error {
      override name = 'StreamClosed';
    }
    const serialized = serializeError(new StreamClosed('closed'), 0);

    expect(serialized.type).toBe('StreamClosed');
    expect(serialized.message).toBe('closed');
  });

  it('should stringify non-Error values', () => {
    expect(serializeError('plain failure', 3)).toEqual({ type: 'string', message: 'plain failure' });
    expect(serializeError(42, 3)).toEqual({ type: 'number', message: '42' });
  });
});
