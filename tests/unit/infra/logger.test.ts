import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level and name', () => {
    const logger = createLogger({ level: 'warn', name: 'cache-test', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toEqual({ name: 'cache-test' });
  });

  it('adds context to child loggers', () => {
    const logger = createLogger({ level: 'silent', pretty: false });

    const child = createChildLogger(logger, { component: 'cache-controller' });

    expect(child.bindings()).toEqual({ name: 'tiered-cache', component: 'cache-controller' });
  });
});
