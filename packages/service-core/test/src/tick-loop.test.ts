import { logger } from '@changeplane/lib-services-framework';
import { getEventListeners } from 'events';
import { describe, expect, it, vi } from 'vitest';

import { TickLoop } from '../../src/capture/TickLoop.js';

describe('tick loop', () => {
  it('does not accumulate abort listeners across ticks', async () => {
    const listenerCounts: number[] = [];
    let done = () => {};
    const finished = new Promise<void>((resolve) => (done = () => resolve()));

    const loop = new TickLoop({
      name: 'Test tick',
      interval_ms: 1,
      logger,
      tick: async (signal) => {
        listenerCounts.push(getEventListeners(signal, 'abort').length);
        if (listenerCounts.length == 20) {
          done();
        }
      }
    });
    loop.start();
    await finished;
    await loop.stop();

    expect(listenerCounts.slice(0, 20)).toEqual(new Array(20).fill(0));
  });

  it('stops without waiting for the interval to elapse', async () => {
    let ticked = () => {};
    const firstTick = new Promise<void>((resolve) => (ticked = () => resolve()));
    const tick = vi.fn(async () => ticked());

    const loop = new TickLoop({ name: 'Test tick', interval_ms: 60_000, logger, tick });
    loop.start();
    await firstTick;

    const startedStopping = Date.now();
    await loop.stop();
    expect(Date.now() - startedStopping).toBeLessThan(1_000);
    expect(tick).toHaveBeenCalledTimes(1);
  });

  it('keeps ticking after a failed tick', async () => {
    let done = () => {};
    const finished = new Promise<void>((resolve) => (done = () => resolve()));
    let calls = 0;
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => logger);

    const loop = new TickLoop({
      name: 'Test tick',
      interval_ms: 1,
      logger,
      tick: async () => {
        calls++;
        if (calls == 1) {
          throw new Error('boom');
        }
        done();
      }
    });
    loop.start();
    await finished;
    await loop.stop();

    expect(errorSpy).toHaveBeenCalledWith('Test tick failed', new Error('boom'));
    errorSpy.mockRestore();
  });
});
