import { describe, it, expect, vi } from 'vitest';
import { Lazy } from '../lazy.js';

describe('Lazy', () => {
  it('does not initialize until first use', () => {
    const init = vi.fn(async () => 'client');
    const lazy = new Lazy(init);

    expect(init).not.toHaveBeenCalled();
    expect(lazy.started).toBe(false);
  });

  it('initializes once and reuses the value', async () => {
    const init = vi.fn(async () => ({ id: 1 }));
    const lazy = new Lazy(init);

    const first = await lazy.get();
    const second = await lazy.get();

    expect(first).toBe(second);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('shares one initialization between concurrent first callers', async () => {
    let resolveInit: (value: string) => void = () => {};
    const init = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          resolveInit = resolve;
        })
    );
    const lazy = new Lazy(init);

    const a = lazy.get();
    const b = lazy.get();
    resolveInit('credential');

    await expect(Promise.all([a, b])).resolves.toEqual(['credential', 'credential']);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('retries after a failed initialization', async () => {
    const init = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('token endpoint unreachable'))
      .mockResolvedValueOnce('client');
    const lazy = new Lazy(init);

    await expect(lazy.get()).rejects.toThrow('token endpoint unreachable');
    expect(lazy.started).toBe(false);
    await expect(lazy.get()).resolves.toBe('client');
    expect(init).toHaveBeenCalledTimes(2);
  });

  it('initializes again after reset()', async () => {
    const init = vi.fn(async () => 'client');
    const lazy = new Lazy(init);

    await lazy.get();
    lazy.reset();
    await lazy.get();

    expect(init).toHaveBeenCalledTimes(2);
  });
});
