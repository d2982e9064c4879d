import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { LockLostError, MemoryLockManager, MemoryLockTable } from '../../src/locks/locks-index.js';

describe('MemoryLockManager', () => {
  let locks: MemoryLockTable;

  beforeEach(() => {
    locks = new Map();
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const manager = (holder: string, timeout = 1000) => new MemoryLockManager({ name: 'owner', holder, timeout, locks });

  test('only one holder can acquire the lock', async () => {
    const a = manager('a');
    const b = manager('b');

    const handle = await a.acquire();
    expect(handle).not.toBeNull();
    expect(await b.acquire()).toBeNull();

    const state = await b.inspect();
    expect(state?.holder).toBe('a');
    expect(state?.lock_id).toBe(handle?.lock_id);
    expect(state?.expires_at.toISOString()).toBe('2024-01-01T00:00:01.000Z');
  });

  test('expired locks can be taken over and refreshing the old handle fails', async () => {
    const a = manager('a');
    const b = manager('b');

    const first = await a.acquire();
    vi.setSystemTime(new Date('2024-01-01T00:00:02Z'));
    expect(await a.inspect()).toBeNull();

    const second = await b.acquire();
    expect(second).not.toBeNull();
    await expect(first?.refresh()).rejects.toBeInstanceOf(LockLostError);

    // Releasing a stale handle leaves the new holder in place
    await first?.release();
    expect((await a.inspect())?.holder).toBe('b');
  });

  test('refresh extends the expiry', async () => {
    const a = manager('a');
    const handle = await a.acquire();

    vi.setSystemTime(new Date('2024-01-01T00:00:00.800Z'));
    await handle?.refresh();
    vi.setSystemTime(new Date('2024-01-01T00:00:01.500Z'));

    expect((await a.inspect())?.holder).toBe('a');
  });

  test('a released lock can be acquired by another holder', async () => {
    const a = manager('a');
    const b = manager('b');

    const handle = await a.acquire();
    await handle?.release();

    expect(await a.inspect()).toBeNull();
    const taken = await b.acquire();
    expect(taken?.lock_id).not.toBe(handle?.lock_id);
    expect((await a.inspect())?.holder).toBe('b');
  });
});
