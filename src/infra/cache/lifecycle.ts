/**
 * Controller lifecycle helpers.
 *
 * Buffered db writes and binding changes are persisted only by close(), so
 * every controller must be closed on every exit path.
 */

import type { CacheController } from './controller.js';
import type { Logger } from 'pino';

/**
 * Open a controller, run `fn` with it and close it whether `fn` returns or throws.
 */
export const runWithCache = async <T>(
  open: () => Promise<CacheController>,
  fn: (cache: CacheController) => Promise<T>
): Promise<T> => {
  const cache = await open();
  try {
    return await fn(cache);
  } finally {
    await cache.close();
  }
};

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface ShutdownHookOptions {
  /** Called with the exit code once the controller is closed. Default: process.exit */
  exit?: (code: number) => void;
}

/**
 * Close the controller when the process is asked to stop, runs out of work or
 * hits an uncaught error. Signals exit with 0 after a clean close; uncaught
 * errors always exit with 1.
 * @returns Disposer that removes the hooks
 */
export const installShutdownHooks = (
  controller: CacheController,
  logger: Logger,
  options: ShutdownHookOptions = {}
): (() => void) => {
  const log = logger.child({ component: 'cache-shutdown' });
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let closed = false;

  const closeOnce = async (reason: string): Promise<boolean> => {
    if (closed) {
      return true;
    }
    closed = true;
    log.info({ reason }, 'Closing cache controller');
    try {
      await controller.close();
      return true;
    } catch (error) {
      log.error({ err: error }, 'Cache controller failed to close');
      return false;
    }
  };

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    const clean = await closeOnce(signal);
    exit(clean ? 0 : 1);
  };

  const fail = async (reason: string, error: unknown): Promise<void> => {
    log.fatal({ err: error }, `Process stopping after ${reason}`);
    await closeOnce(reason);
    exit(1);
  };

  const onUncaughtException = (error: Error): void => {
    void fail('uncaughtException', error);
  };

  const onUnhandledRejection = (reason: unknown): void => {
    void fail('unhandledRejection', reason);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    void shutdown(signal);
  };

  const onBeforeExit = (): void => {
    void closeOnce('beforeExit');
  };

  const dispose = (): void => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
    process.off('beforeExit', onBeforeExit);
    process.off('uncaughtException', onUncaughtException);
    process.off('unhandledRejection', onUnhandledRejection);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, onSignal);
  }
  process.once('beforeExit', onBeforeExit);
  process.once('uncaughtException', onUncaughtException);
  process.once('unhandledRejection', onUnhandledRejection);

  return dispose;
};
