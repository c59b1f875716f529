import { afterEach, describe, expect, it, vi } from 'vitest';

import { installShutdownHooks, runWithCache } from '@/infra/cache/lifecycle.js';

import { makeTestLogger } from '../../../fixtures/fakes.js';

import type { CacheController } from '@/infra/cache/controller.js';

const makeClosable = (close: () => Promise<void> = async () => undefined) => {
  const closeSpy = vi.fn(close);
  // Only close() is reached by the lifecycle helpers
  const controller = { close: closeSpy } as unknown as CacheController;
  return { controller, close: closeSpy };
};

describe('runWithCache', () => {
  it('returns the callback result and closes the controller', async () => {
    const { controller, close } = makeClosable();

    const result = await runWithCache(
      async () => controller,
      async () => 'done'
    );

    expect(result).toBe('done');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes the controller when the callback throws', async () => {
    const { controller, close } = makeClosable();

    await expect(
      runWithCache(
        async () => controller,
        async () => {
          throw new Error('request failed');
        }
      )
    ).rejects.toThrow('request failed');

    expect(close).toHaveBeenCalledTimes(1);
  });
});

/** Listener that install() adds to `current()`, to be called directly */
const addedListener = <L>(current: () => L[], install: () => void): L => {
  const before = new Set(current());
  install();
  const added = current().find((listener) => !before.has(listener));
  if (added === undefined) {
    throw new Error('No listener was installed');
  }
  return added;
};

describe('installShutdownHooks', () => {
  let dispose: (() => void) | undefined;

  afterEach(() => {
    dispose?.();
    dispose = undefined;
  });

  it('closes the controller once on beforeExit', async () => {
    const { controller, close } = makeClosable();
    const onBeforeExit = addedListener(
      () => process.listeners('beforeExit'),
      () => {
        dispose = installShutdownHooks(controller, makeTestLogger());
      }
    );

    onBeforeExit(0);
    onBeforeExit(0);
    await vi.waitFor(() => {
      expect(close).toHaveBeenCalledTimes(1);
    });
  });

  it('removes its listeners when disposed', () => {
    const before = process.listenerCount('SIGTERM');
    const { controller } = makeClosable();

    const remove = installShutdownHooks(controller, makeTestLogger());
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);

    remove();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });

  it('closes the controller and exits with 1 on an uncaught exception', async () => {
    const { controller, close } = makeClosable();
    const exit = vi.fn();
    const onUncaught = addedListener(
      () => process.listeners('uncaughtException'),
      () => {
        dispose = installShutdownHooks(controller, makeTestLogger(), { exit });
      }
    );

    onUncaught(new Error('boom'), 'uncaughtException');

    await vi.waitFor(() => {
      expect(exit).toHaveBeenCalledWith(1);
    });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes the controller and exits with 1 on an unhandled rejection', async () => {
    const { controller, close } = makeClosable();
    const exit = vi.fn();
    const onRejection = addedListener(
      () => process.listeners('unhandledRejection'),
      () => {
        dispose = installShutdownHooks(controller, makeTestLogger(), { exit });
      }
    );

    onRejection(new Error('lost'), Promise.resolve());

    await vi.waitFor(() => {
      expect(exit).toHaveBeenCalledWith(1);
    });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('removes the fatal error listeners when disposed', () => {
    const before = process.listenerCount('uncaughtException');
    const { controller } = makeClosable();

    const remove = installShutdownHooks(controller, makeTestLogger(), { exit: vi.fn() });
    expect(process.listenerCount('uncaughtException')).toBe(before + 1);

    remove();
    expect(process.listenerCount('uncaughtException')).toBe(before);
  });

  it('logs a failed close instead of rejecting', async () => {
    const { controller, close } = makeClosable(async () => {
      throw new Error('flush failed');
    });
    const onBeforeExit = addedListener(
      () => process.listeners('beforeExit'),
      () => {
        dispose = installShutdownHooks(controller, makeTestLogger());
      }
    );

    onBeforeExit(0);

    await vi.waitFor(() => {
      expect(close).toHaveBeenCalledTimes(1);
    });
  });
});
