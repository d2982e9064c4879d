import { container, ContainerImplementation, createInMemoryProbe, ProbeModule } from '@changeplane/lib-services-framework';
import fastify, { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { configureFastifyServer } from '../../../src/routes/configure-fastify.js';
import { TestCluster } from '../cluster.js';

describe('probe routes', () => {
  let cluster: TestCluster;
  let app: FastifyInstance;
  let probes: ProbeModule;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    probes = createInMemoryProbe();
    container.register(ContainerImplementation.PROBES, probes);

    cluster = await TestCluster.start({ captures: 1 });
    app = fastify();
    configureFastifyServer(app, { service_context: { controlAPI: cluster.api() } });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await cluster.stop();
    vi.useRealTimers();
  });

  it('reports startup and readiness once ready', async () => {
    const before = await app.inject({ method: 'GET', url: '/probes/startup' });
    expect(before.statusCode).toBe(400);
    expect(before.json()).toEqual({ ready: false, started: false, touched_at: '2024-01-01T00:00:00.000Z' });

    await probes.ready();

    const startup = await app.inject({ method: 'GET', url: '/probes/startup' });
    expect(startup.statusCode).toBe(200);
    const readiness = await app.inject({ method: 'GET', url: '/probes/readiness' });
    expect(readiness.statusCode).toBe(200);

    await probes.unready();
    const unready = await app.inject({ method: 'GET', url: '/probes/readiness' });
    expect(unready.statusCode).toBe(400);
  });

  it('fails liveness when the probe is not touched', async () => {
    expect((await app.inject({ method: 'GET', url: '/probes/liveness' })).statusCode).toBe(200);

    vi.setSystemTime(new Date('2024-01-01T00:00:10.001Z'));
    expect((await app.inject({ method: 'GET', url: '/probes/liveness' })).statusCode).toBe(400);

    await probes.touch();
    expect((await app.inject({ method: 'GET', url: '/probes/liveness' })).statusCode).toBe(200);
  });
});
