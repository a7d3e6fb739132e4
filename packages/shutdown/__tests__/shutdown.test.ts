import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  clearShutdownHandlers,
  getHandlerCount,
  getIsShuttingDown,
  gracefulShutdown,
  registerShutdownHandler,
  resetShutdownState,
  runShutdownHandlers,
} from '../index';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
}));

describe('shutdown manager', () => {
  beforeEach(() => {
    clearShutdownHandlers();
    resetShutdownState();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers and unregisters handlers', () => {
    const unregister = registerShutdownHandler(() => undefined);
    expect(getHandlerCount()).toBe(1);

    unregister();
    expect(getHandlerCount()).toBe(0);
  });

  it('runs every handler and counts failures', async () => {
    const closed: string[] = [];
    registerShutdownHandler(async () => { closed.push('server'); });
    registerShutdownHandler(() => { throw new Error('pool already closed'); });
    registerShutdownHandler(async () => { closed.push('store'); });

    await expect(runShutdownHandlers(1000)).resolves.toBe(1);
    expect(closed).toEqual(['server', 'store']);
  });

  it('counts handlers that time out', async () => {
    registerShutdownHandler(() => new Promise<void>(() => undefined));

    await expect(runShutdownHandlers(20)).resolves.toBe(1);
  });

  it('exits once with a failure code when a handler fails', async () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`process.exit(${String(code)})`);
    });
    registerShutdownHandler(() => { throw new Error('boom'); });

    await expect(gracefulShutdown('SIGTERM')).rejects.toThrow('process.exit(1)');
    await gracefulShutdown('SIGINT');

    expect(getIsShuttingDown()).toBe(true);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
