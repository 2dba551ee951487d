import type { Logger } from 'pino';
import logger from './shared/logger';

const SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

/**
 * First SIGINT/SIGTERM aborts the controller: the worker stops claiming and
 * lets the in-flight job finish. A second signal exits immediately.
 * Returns a function that removes the handlers.
 */
export function setupGracefulShutdown(
  controller: AbortController,
  log: Logger = logger,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      log.warn({ signal }, 'Second shutdown signal, exiting without waiting for the in-flight job');
      exit(130);
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'Graceful shutdown initiated, finishing in-flight job');
    controller.abort();
  };

  for (const signal of SIGNALS) {
    process.on(signal, handler);
  }

  return () => {
    for (const signal of SIGNALS) {
      process.off(signal, handler);
    }
  };
}
