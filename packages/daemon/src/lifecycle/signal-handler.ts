/**
 * Signal handler registration for issuer graceful shutdown.
 *
 * Wires SIGINT, SIGTERM, and (on Windows) SIGBREAK to IssuerLifecycle.shutdown().
 * Also handles uncaughtException and unhandledRejection as last-resort shutdown triggers.
 */

import type { IssuerLifecycle } from './issuer-lifecycle.js';

/**
 * - SIGINT / SIGTERM / SIGBREAK: shutdown, then exit(0)
 * - uncaughtException / unhandledRejection: shutdown, then exit(1)
 */
export function registerSignalHandlers(lifecycle: IssuerLifecycle): void {
  const stop = (signal: string, code: number) => {
    void lifecycle.shutdown(signal).finally(() => process.exit(code));
  };

  process.on('SIGINT', () => stop('SIGINT', 0));
  process.on('SIGTERM', () => stop('SIGTERM', 0));

  if (process.platform === 'win32') {
    process.on('SIGBREAK', () => stop('SIGBREAK', 0));
  }

  process.on('uncaughtException', (err) => {
    console.error('Uncaught exception:', err);
    stop('uncaughtException', 1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    stop('unhandledRejection', 1);
  });
}
