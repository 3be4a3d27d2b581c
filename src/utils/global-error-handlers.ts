/**
 * Global process-level error handlers.
 * Captures uncaught exceptions, unhandled rejections and Node warnings
 * and forwards them to the logger.
 */

import { logger } from './logger.js';

let installed = false;

export function installGlobalErrorHandlers(): void {
  if (installed) return;
  installed = true;

  process.on('uncaughtException', (err: unknown) => {
    logger.error('Uncaught exception', err instanceof Error ? err : new Error(String(err)));
    // Leave the exit decision to the supervisor; mark non-zero.
    process.exitCode = 1;
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  process.on('warning', (warning) => {
    logger.warn(`Node warning: ${warning.name} - ${warning.message}`);
  });
}
