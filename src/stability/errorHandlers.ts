// Process-level error handlers and graceful shutdown.

import type { Server } from 'http';
import { errMessage, logger } from '@/utils/logger';

const SHUTDOWN_TIMEOUT_MS = 15_000;

type Cleanup = () => Promise<void> | void;

let serverInstance: Server | null = null;
const cleanups: Array<{ name: string; run: Cleanup }> = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Register a resource to release on shutdown; runs after the HTTP server stops accepting. */
export function onShutdown(name: string, run: Cleanup): void {
  cleanups.push({ name, run });
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown', { afterMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forced.unref();

  let code = exitCode;
  try {
    if (serverInstance) await closeServer(serverInstance);
  } catch (err) {
    logger.error('process:server_close_failed', { error: errMessage(err) });
    code = 1;
  }

  for (const { name, run } of cleanups) {
    try {
      await run();
    } catch (err) {
      logger.error('process:cleanup_failed', { name, error: errMessage(err) });
      code = 1;
    }
  }

  clearTimeout(forced);
  process.exit(code);
}
