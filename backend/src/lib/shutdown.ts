/**
 * Graceful Shutdown
 * Close the server on SIGINT/SIGTERM, bounded by a timeout
 */

import type { Logger } from './logger.js';

export interface Closable {
  close(): Promise<unknown>;
}

export interface ShutdownOptions {
  timeoutMs: number;
  log: Logger;
  signals?: NodeJS.Signals[];
  exit?: (code: number) => void;
}

/**
 * Resolves with the exit code: 0 once the server has closed, 1 when closing
 * fails or takes longer than `timeoutMs`.
 */
export async function closeWithTimeout(server: Closable, timeoutMs: number, log: Logger): Promise<number> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<number>(resolve => {
    timer = setTimeout(() => {
      log.error(`Server did not close within ${timeoutMs}ms`);
      resolve(1);
    }, timeoutMs);
  });

  try {
    return await Promise.race([server.close().then(() => 0), timeout]);
  } catch (error) {
    log.error('Server close failed', error);
    return 1;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Returns a function that removes the installed handlers.
 */
export function handleShutdownSignals(server: Closable, options: ShutdownOptions): () => void {
  const {
    timeoutMs,
    log,
    signals = ['SIGINT', 'SIGTERM'],
    exit = (code: number) => process.exit(code),
  } = options;
  let shuttingDown = false;

  // Stays installed so repeated signals during a slow close are ignored
  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;

    log.info(`Received ${signal}, shutting down...`);
    void closeWithTimeout(server, timeoutMs, log).then(exit);
  };

  for (const signal of signals) {
    process.on(signal, onSignal);
  }

  return () => {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
  };
}
