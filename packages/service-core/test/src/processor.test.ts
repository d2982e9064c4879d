import { ErrorCode } from '@changeplane/lib-services-framework';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ChangefeedState } from '../../src/storage/model.js';
import { TestCluster } from './cluster.js';

const T0 = Date.parse('2024-01-01T00:00:00Z');

describe('processors', () => {
  let cluster: TestCluster;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  afterEach(async () => {
    await cluster.stop();
    vi.useRealTimers();
  });

  it('claims each table once before starting it', async () => {
    cluster = await TestCluster.start();
    await cluster.api().createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(3);

    expect(cluster.pipelines.started.map((s) => s.table_id).sort()).toEqual([1, 2, 3, 4]);
    const tasks = await cluster.storage.listTableTasks({ changefeed_id: 'cf1' });
    expect(tasks.map((t) => t.state)).toEqual(['running', 'running', 'running', 'running']);
  });

  it('puts the changefeed into error on a fatal table fault and recovers on resume', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    cluster.pipelines.failOnce.add(2);
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(3);

    const failed = await api.getChangefeed('cf1');
    expect(failed.state).toBe(ChangefeedState.ERROR);
    expect(failed.error).toEqual({
      code: ErrorCode.ErrProcessorFatal,
      message: 'table 2 failed: boom',
      time: '2024-01-01T00:00:00.000Z'
    });
    expect(await cluster.storage.listTableTasks()).toEqual([]);
    expect(await cluster.storage.listProcessors()).toEqual([]);
    expect((await api.listChangefeeds(ChangefeedState.ERROR)).map((cf) => cf.id)).toEqual(['cf1']);

    await api.resumeChangefeed('cf1');
    await cluster.tick(2);

    const [lo, hi] = cluster.nodes.map((n) => n.id).sort();
    const resumed = await api.getChangefeed('cf1');
    expect(resumed.state).toBe(ChangefeedState.NORMAL);
    expect(resumed.error).toBeUndefined();
    expect(await cluster.reportedTables('cf1')).toEqual({ [lo]: [1, 3], [hi]: [2, 4] });
  });

  it('advances the checkpoint once every table runs', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(2);
    expect((await api.getChangefeed('cf1')).checkpoint_ts).toBe(T0);

    vi.setSystemTime(T0 + 1_000);
    await cluster.tick(2);

    const cf = await api.getChangefeed('cf1');
    expect(cf.checkpoint_ts).toBe(T0 + 1_000);
    expect(cf.checkpoint_time).toBe('2024-01-01T00:00:01.000Z');
    expect(cf.start_ts).toBe(T0);
  });

  it('resumes a moved table from the changefeed checkpoint', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(2);
    vi.setSystemTime(T0 + 1_000);
    await cluster.tick(2);

    const [lo, hi] = cluster.nodes.map((n) => n.id).sort();
    await api.moveTable({ changefeed_id: 'cf1', capture_id: hi, table_id: 1 });
    await cluster.tick(3);

    const restarted = cluster.pipelines.started.filter((s) => s.table_id == 1);
    expect(restarted.map((s) => [s.capture_id, s.start_ts])).toEqual([
      [lo, T0],
      [hi, T0 + 1_000]
    ]);
  });
});
