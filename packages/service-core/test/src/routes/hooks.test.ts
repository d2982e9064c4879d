import fastify from 'fastify';
import { describe, expect, it } from 'vitest';

import { createRequestQueueHook } from '../../../src/routes/hooks.js';

describe('request queue hook', () => {
  it('answers 429 while the only slot is taken', async () => {
    let markStarted = () => {};
    const started = new Promise<void>((resolve) => (markStarted = () => resolve()));
    let release = () => {};
    const released = new Promise<void>((resolve) => (release = () => resolve()));

    const app = fastify();
    app.addHook('onRequest', createRequestQueueHook({ max_queue_depth: 0, concurrency: 1 }));
    app.get('/slow', async () => {
      markStarted();
      await released;
      return { done: true };
    });
    await app.ready();

    // inject only dispatches once then() is called
    const first = app.inject({ method: 'GET', url: '/slow' }).then((response) => response);
    await started;

    const rejected = await app.inject({ method: 'GET', url: '/slow' });
    expect(rejected.statusCode).toBe(429);
    expect(rejected.json()).toEqual({
      error_code: 'CDC:ErrTooManyRequests',
      error_msg: 'Too many requests: 0 requests queued'
    });

    release();
    const accepted = await first;
    expect(accepted.statusCode).toBe(200);
    expect(accepted.json()).toEqual({ done: true });

    await app.close();
  });
});
