import { errorMessage, type Logger } from '@cartpilot/logging';

/**
 * Graceful shutdown on SIGTERM / SIGINT, in order:
 * 1. HTTP server (stop accepting requests)
 * 2. Shopping sessions (close every browser context)
 * 3. Browser (kills the Chromium child process)
 *
 * A 10-second force-kill timeout ensures the process exits even if a step hangs.
 */
export interface ShutdownServer {
  close(callback?: (err?: Error) => void): unknown;
}

export interface ShutdownSessions {
  closeAll(): Promise<void>;
}

export interface ShutdownBrowserManager {
  close(): Promise<void>;
  isRunning(): boolean;
}

export interface ShutdownResources {
  server: ShutdownServer;
  sessions: ShutdownSessions;
  browserManager: ShutdownBrowserManager;
  logger: Logger;
  forceExitMs?: number;
}

function closeServer(server: ShutdownServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export async function shutdown(resources: ShutdownResources): Promise<void> {
  const { server, sessions, browserManager, logger } = resources;

  await closeServer(server);
  logger.info('HTTP server closed.');

  await sessions.closeAll();
  logger.info('Shopping sessions closed.');

  if (browserManager.isRunning()) {
    await browserManager.close();
    logger.info('Browser closed.');
  }
}

export function registerShutdownHandlers(resources: ShutdownResources): void {
  const { logger } = resources;
  const forceExitMs = resources.forceExitMs ?? 10_000;
  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}. Shutting down...`);

    const forceKillTimer = setTimeout(() => {
      logger.error(`Graceful shutdown timed out after ${forceExitMs / 1000}s. Forcing exit.`);
      process.exit(1);
    }, forceExitMs);
    forceKillTimer.unref();

    try {
      await shutdown(resources);
      clearTimeout(forceKillTimer);
      logger.info('Graceful shutdown complete.');
      process.exit(0);
    } catch (err) {
      logger.error(`Error during graceful shutdown: ${errorMessage(err)}`);
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}
