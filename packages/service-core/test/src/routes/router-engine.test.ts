import { describe, expect, it, vi } from 'vitest';

import { PROBES_ROUTES } from '../../../src/routes/endpoints/probes.js';
import { RouterEngine } from '../../../src/routes/RouterEngine.js';

describe('router engine', () => {
  it('does not start a server without routes', async () => {
    const engine = new RouterEngine();
    const setup = vi.fn(async () => ({ onShutdown: async () => {} }));

    await engine.start(setup);

    expect(setup).not.toHaveBeenCalled();
    expect(engine.running).toBe(false);
  });

  it('passes the registered routes to the server and stops it once', async () => {
    const engine = new RouterEngine();
    engine.registerRoutes({ probe_routes: PROBES_ROUTES });
    const onShutdown = vi.fn(async () => {});

    await engine.start(async (routes) => {
      expect(routes.probe_routes.map((route) => route.path)).toEqual([
        '/probes/startup',
        '/probes/liveness',
        '/probes/readiness'
      ]);
      expect(routes.api_routes).toEqual([]);
      return { onShutdown };
    });
    expect(engine.running).toBe(true);

    await engine.shutDown();
    await engine.shutDown();
    expect(onShutdown).toHaveBeenCalledTimes(1);
    expect(engine.running).toBe(false);
  });
});
