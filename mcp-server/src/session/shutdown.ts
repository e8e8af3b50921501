import type { Logger } from '../logger.js';
import type { SessionManager } from './session-manager.js';

/** The slice of `process` the hooks attach to. */
export interface ShutdownTarget {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  off(event: string, listener: (...args: unknown[]) => void): unknown;
  exit(code: number): void;
}

const SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

/**
 * Ties session teardown to every way the process can end: signals, fatal
 * errors and a plain exit. Returns a function that detaches the hooks.
 */
export function registerShutdownHooks(
  manager: SessionManager,
  logger: Logger,
  target: ShutdownTarget = process,
): () => void {
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ reason }, 'Shutting down');
    manager.teardown().then(
      (report) => {
        if (report.cleanup.failures.length > 0) {
          logger.warn({ failures: report.cleanup.failures }, 'Shutdown left files behind');
        }
        logger.info('Shutdown complete');
        target.exit(exitCode);
      },
      (error: unknown) => {
        logger.error({ err: error }, 'Teardown failed during shutdown');
        target.exit(1);
      },
    );
  };

  const signalHandlers = SIGNALS.map((signal) => {
    const handler = (): void => shutdown(signal, 0);
    return { event: signal, handler };
  });

  const onFatal = (error: unknown): void => {
    logger.fatal({ err: error }, 'Fatal error');
    shutdown('fatal error', 1);
  };

  const onExit = (): void => {
    manager.teardownSync();
  };

  const handlers = [
    ...signalHandlers,
    { event: 'uncaughtException', handler: onFatal },
    { event: 'unhandledRejection', handler: onFatal },
    { event: 'exit', handler: onExit },
  ];

  for (const { event, handler } of handlers) {
    target.on(event, handler);
  }

  return () => {
    for (const { event, handler } of handlers) {
      target.off(event, handler);
    }
  };
}
