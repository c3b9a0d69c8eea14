import { describe, it, expect } from 'vitest';
import { silentLogger } from '@cartpilot/logging';
import { shutdown } from './shutdown.js';

describe('shutdown', () => {
  it('closes the server, then the sessions, then the browser', async () => {
    const order: string[] = [];
    let running = true;

    await shutdown({
      server: {
        close: (callback) => {
          order.push('server');
          callback?.();
        },
      },
      sessions: {
        closeAll: async () => {
          order.push('sessions');
        },
      },
      browserManager: {
        isRunning: () => running,
        close: async () => {
          order.push('browser');
          running = false;
        },
      },
      logger: silentLogger,
    });

    expect(order).toEqual(['server', 'sessions', 'browser']);
  });

  it('skips a browser that never launched', async () => {
    const order: string[] = [];

    await shutdown({
      server: { close: (callback) => callback?.() },
      sessions: { closeAll: async () => undefined },
      browserManager: {
        isRunning: () => false,
        close: async () => {
          order.push('browser');
        },
      },
      logger: silentLogger,
    });

    expect(order).toEqual([]);
  });

  it('propagates a server close error', async () => {
    await expect(
      shutdown({
        server: { close: (callback) => callback?.(new Error('not running')) },
        sessions: { closeAll: async () => undefined },
        browserManager: { isRunning: () => false, close: async () => undefined },
        logger: silentLogger,
      }),
    ).rejects.toThrow('not running');
  });
});
