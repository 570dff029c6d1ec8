import { afterEach, describe, expect, it, vi } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

async function importDebugModule(env: { ROTATION_DEBUG?: string; NODE_ENV?: string } = {}) {
  vi.resetModules();
  vi.stubEnv('ROTATION_DEBUG', env.ROTATION_DEBUG ?? '');
  vi.stubEnv('NODE_ENV', env.NODE_ENV ?? 'test');
  return import('@utils/debug');
}

describe('debug utilities', () => {
  it('stays silent when ROTATION_DEBUG disables it', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'false', NODE_ENV: 'development' });

    mod.debugLog('swap.created', 'payload');

    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('logs on the channel when ROTATION_DEBUG enables it', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: '1' });

    mod.debugLog('swap.eligible', { targets: 2 });

    expect(infoSpy).toHaveBeenCalledWith('[rotation-swaps] swap.eligible', { targets: 2 });
  });

  it('defaults to on only in development', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    const quiet = await importDebugModule({ NODE_ENV: 'production' });
    quiet.debugLog('env', 'quiet');
    expect(infoSpy).not.toHaveBeenCalled();

    const chatty = await importDebugModule({ NODE_ENV: 'development' });
    chatty.debugLog('env', 'chatty');
    expect(infoSpy).toHaveBeenCalledWith('[rotation-swaps] env', 'chatty');
  });

  it('limits logging to the areas ROTATION_DEBUG lists', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'store, validator, bogus' });

    mod.debugLog('swap.created', { swapId: 'swap-1' });
    mod.debugLog('validator.run', { residents: 2 });
    mod.debugLog('store.sqlite.open', { filename: ':memory:' });
    mod.debugLog('env', 'fallback');

    expect(infoSpy.mock.calls).toEqual([
      ['[rotation-swaps] validator.run', { residents: 2 }],
      ['[rotation-swaps] store.sqlite.open', { filename: ':memory:' }],
    ]);
  });

  it('lets setDebugLogging override the environment', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'false' });

    mod.setDebugLogging(true);
    mod.debugLog('env', 'forced');
    expect(infoSpy).toHaveBeenCalledTimes(1);

    mod.setDebugLogging(['swap']);
    mod.debugLog('env', 'filtered');
    mod.debugLog('swap.transition', 'kept');
    expect(infoSpy).toHaveBeenCalledTimes(2);
    expect(infoSpy).toHaveBeenLastCalledWith('[rotation-swaps] swap.transition', 'kept');
  });

  it('evaluates lazy payloads and reports their failures', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'true' });

    mod.debugLog('validator.run', () => ({ total: 3 }));
    mod.debugLog('validator.blocked', () => {
      throw new Error('boom');
    });

    expect(infoSpy).toHaveBeenNthCalledWith(1, '[rotation-swaps] validator.run', { total: 3 });
    expect(infoSpy).toHaveBeenNthCalledWith(2, '[rotation-swaps] validator.blocked', {
      error: 'boom',
    });
  });

  it('skips lazy payloads entirely when disabled', async () => {
    const mod = await importDebugModule({ ROTATION_DEBUG: '0' });
    const payload = vi.fn(() => ({ expensive: true }));

    mod.debugLog('validator.run', payload);

    expect(payload).not.toHaveBeenCalled();
  });

  it('brackets grouped work and returns its value', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'true' });

    const result = mod.withDebugGroup('swap.approve', { swapId: 'swap-1' }, () => 42);

    expect(result).toBe(42);
    expect(infoSpy.mock.calls).toEqual([
      ['[rotation-swaps] ▶ swap.approve', { swapId: 'swap-1' }],
      ['[rotation-swaps] ◀ swap.approve'],
    ]);
  });

  it('closes the group when the work throws', async () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'true' });

    expect(() =>
      mod.withDebugGroup('swap.approve', undefined, () => {
        throw new Error('denied');
      }),
    ).toThrow('denied');
    expect(infoSpy).toHaveBeenLastCalledWith('[rotation-swaps] ◀ swap.approve');
  });

  it('routes errors to console.error', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const mod = await importDebugModule({ ROTATION_DEBUG: 'store' });

    mod.debugError('store.sqlite.write', 'disk full');

    expect(errorSpy).toHaveBeenCalledWith('[rotation-swaps] store.sqlite.write', 'disk full');
    expect(mod.getDebugChannel()).toBe('[rotation-swaps]');
  });
});
