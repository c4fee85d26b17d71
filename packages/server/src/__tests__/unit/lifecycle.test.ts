import { describe, it, expect, vi } from 'vitest';
import { createShutdown, type Closable } from '../../lifecycle.js';

function fakeServer(error?: Error): Closable & { closed: number } {
  return {
    closed: 0,
    close(callback) {
      this.closed++;
      callback?.(error);
    },
  };
}

describe('createShutdown', () => {
  it('closes the server before running cleanups in order', async () => {
    const server = fakeServer();
    const calls: string[] = [];
    const shutdown = createShutdown(server, [
      () => {
        calls.push(`timer after ${server.closed} close`);
      },
      async () => {
        calls.push('database');
      },
    ]);

    await shutdown();

    expect(calls).toEqual(['timer after 1 close', 'database']);
  });

  it('runs only once when signalled twice', async () => {
    const server = fakeServer();
    const closePool = vi.fn(async () => {});
    const shutdown = createShutdown(server, [closePool]);

    await Promise.all([shutdown(), shutdown()]);

    expect(server.closed).toBe(1);
    expect(closePool).toHaveBeenCalledTimes(1);
  });

  it('skips cleanups when the server fails to close', async () => {
    const closePool = vi.fn();
    const shutdown = createShutdown(fakeServer(new Error('not running')), [closePool]);

    await expect(shutdown()).rejects.toThrow('not running');
    expect(closePool).not.toHaveBeenCalled();
  });
});
