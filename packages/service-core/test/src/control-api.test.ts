import { ErrorCode, logger, ValidationError } from '@changeplane/lib-services-framework';
import * as types from '@changeplane/service-types';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ChangefeedListFilter } from '../../src/api/ControlAPI.js';
import { DEFAULT_CONSISTENT_CONFIG } from '../../src/changefeed/consistent-config.js';
import { ChangefeedState } from '../../src/storage/model.js';
import { sourceTables, TestCluster } from './cluster.js';

const T0 = Date.parse('2024-01-01T00:00:00Z');

describe('control API', () => {
  let cluster: TestCluster;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);
  });

  afterEach(async () => {
    await cluster.stop();
    vi.useRealTimers();
  });

  describe('create', () => {
    it('starts at the current upstream timestamp by default', async () => {
      cluster = await TestCluster.start();
      const info = await cluster.api().createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });

      expect(info.state).toBe(ChangefeedState.NORMAL);
      expect(info.start_ts).toBe(T0);
      expect(info.checkpoint_ts).toBe(T0);
      expect(info.table_ids).toEqual([1, 2, 3, 4]);

      const detail = await cluster.api().getChangefeed('cf1');
      expect(detail).toEqual({
        id: 'cf1',
        state: 'normal',
        checkpoint_ts: T0,
        checkpoint_time: '2024-01-01T00:00:00.000Z',
        error: undefined,
        sink_uri: 'blackhole://',
        create_time: '2024-01-01T00:00:00.000Z',
        start_ts: T0,
        config: {
          ignore_ineligible_table: false,
          consistent: {
            level: 'none',
            max_log_size: 64,
            flush_interval: 2000,
            meta_flush_interval: 200,
            encoding_worker_num: 16,
            flush_worker_num: 8,
            storage: '',
            use_file_backend: false
          }
        },
        table_ids: [1, 2, 3, 4],
        removed_at: undefined,
        task_status: []
      });
    });

    it('generates an id when none is given', async () => {
      cluster = await TestCluster.start();
      const info = await cluster.api().createChangefeed({ sink_uri: 'blackhole://', start_ts: 42 });

      expect(info.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(info.checkpoint_ts).toBe(42);
    });

    it('rejects invalid ids and duplicates', async () => {
      cluster = await TestCluster.start();
      const api = cluster.api();

      await expect(api.createChangefeed({ changefeed_id: 'bad id', sink_uri: 'blackhole://' })).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrAPIInvalidParam }
      });
      await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
      await expect(api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' })).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrChangeFeedAlreadyExists }
      });
    });

    it('does not create a changefeed for an invalid sink', async () => {
      cluster = await TestCluster.start();
      const api = cluster.api();

      await expect(api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'ftp://example' })).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrSinkURIInvalid, details: 'unsupported scheme "ftp"' }
      });
      expect(await api.listChangefeeds('all')).toEqual([]);
    });

    it('rejects a start timestamp that cannot be represented', async () => {
      cluster = await TestCluster.start();
      const api = cluster.api();

      await expect(
        api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://', start_ts: 434218833238016001 })
      ).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrAPIInvalidParam }
      });
      expect(await api.listChangefeeds('all')).toEqual([]);
    });

    it('fills the consistency config with defaults and masks storage credentials', async () => {
      cluster = await TestCluster.start();
      const api = cluster.api();
      const storage = 's3://redo-bucket/cf1?access-key=test-key&secret-access-key=test-secret&endpoint=minio';
      await api.createChangefeed({
        changefeed_id: 'cf1',
        sink_uri: 'blackhole://',
        consistent: { level: 'eventual', storage, flush_interval: 0, use_file_backend: true }
      });

      const detail = await api.getChangefeed('cf1');
      expect(detail.config.consistent).toEqual({
        level: 'eventual',
        max_log_size: 64,
        flush_interval: 2000,
        meta_flush_interval: 200,
        encoding_worker_num: 16,
        flush_worker_num: 8,
        storage: 's3://redo-bucket/cf1?access-key=xxxxx&secret-access-key=xxxxx&endpoint=minio',
        use_file_backend: true
      });
      expect((await cluster.storage.getChangefeed('cf1'))?.config.consistent.storage).toBe(storage);
    });

    it('rejects an invalid consistency config without storing the changefeed', async () => {
      cluster = await TestCluster.start();
      const api = cluster.api();
      const create = (consistent: types.api_routes.ConsistentConfigRequest) =>
        api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://', consistent });

      await expect(create({ level: 'strong' })).rejects.toMatchObject({
        errorData: {
          code: ErrorCode.ErrInvalidReplicaConfig,
          details: 'consistent.level "strong" must be one of none, eventual'
        }
      });
      await expect(create({ level: 'eventual', storage: 'ftp://host/redo' })).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrInvalidReplicaConfig, details: 'unsupported redo storage scheme "ftp"' }
      });
      await expect(
        create({ level: 'eventual', storage: 'local:///data/redo', meta_flush_interval: 20 })
      ).rejects.toMatchObject({
        errorData: {
          code: ErrorCode.ErrInvalidReplicaConfig,
          details: 'consistent.meta_flush_interval 20 must be an integer of at least 50'
        }
      });
      expect(await api.listChangefeeds('all')).toEqual([]);
    });

    it('refuses ineligible tables unless asked to skip them', async () => {
      cluster = await TestCluster.start({
        tables: [...sourceTables(1, 2), { table_id: 3, schema: 'test', name: 'no_key', eligible: false }]
      });
      const api = cluster.api();

      await expect(api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' })).rejects.toMatchObject({
        errorData: { code: ErrorCode.ErrTableIneligible, details: 'test.no_key' }
      });

      const info = await api.createChangefeed({
        changefeed_id: 'cf1',
        sink_uri: 'blackhole://',
        ignore_ineligible_table: true
      });
      expect(info.table_ids).toEqual([1, 2]);
    });
  });

  it('filters the changefeed list by state', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf-a', sink_uri: 'blackhole://' });
    await api.createChangefeed({ changefeed_id: 'cf-b', sink_uri: 'blackhole://' });
    await api.pauseChangefeed('cf-b');
    await cluster.tick(1);

    const ids = async (state?: ChangefeedListFilter) =>
      (await api.listChangefeeds(state)).map((cf) => cf.id).sort();
    expect(await ids(ChangefeedState.NORMAL)).toEqual(['cf-a']);
    expect(await ids(ChangefeedState.STOPPED)).toEqual(['cf-b']);
    expect(await ids(ChangefeedState.ERROR)).toEqual([]);
    expect(await ids('all')).toEqual(['cf-a', 'cf-b']);
    expect(await ids()).toEqual(['cf-a', 'cf-b']);
  });

  it('runs every table of every accepted changefeed exactly once', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    for (const id of ['cf1', 'cf2', 'cf3']) {
      await api.createChangefeed({ changefeed_id: id, sink_uri: 'blackhole://' });
    }
    await expect(api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'ftp://example' })).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrChangeFeedAlreadyExists }
    });
    await cluster.tick(2);

    const listed = await api.listChangefeeds('all');
    expect(listed.map((cf) => cf.id).sort()).toEqual(['cf1', 'cf2', 'cf3']);
    expect(listed.every((cf) => cf.state == ChangefeedState.NORMAL)).toBe(true);

    for (const id of ['cf1', 'cf2', 'cf3']) {
      const running = Object.values(await cluster.reportedTables(id)).flat();
      expect(running.sort()).toEqual([1, 2, 3, 4]);
    }
  });

  it('reports unknown changefeeds', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();

    await expect(api.getChangefeed('nope')).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrChangeFeedNotExists }
    });
    await expect(api.pauseChangefeed('nope')).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrChangeFeedNotExists }
    });
    await expect(api.listAdminJobs('nope')).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrChangeFeedNotExists }
    });
  });

  it('only updates stopped changefeeds', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });

    await expect(api.updateChangefeed({ changefeed_id: 'cf1', sink_uri: 'kafka://broker:9092/topic' })).rejects.toMatchObject(
      { errorData: { code: ErrorCode.ErrChangefeedUpdateRefused } }
    );

    await api.pauseChangefeed('cf1');
    await cluster.tick(1);
    await api.updateChangefeed({ changefeed_id: 'cf1', sink_uri: 'kafka://broker:9092/topic' });

    const detail = await api.getChangefeed('cf1');
    expect(detail.sink_uri).toBe('kafka://broker:9092/topic');
    expect(detail.config).toEqual({ ignore_ineligible_table: false, consistent: DEFAULT_CONSISTENT_CONFIG });
  });

  it('updates the consistency config of a stopped changefeed field by field', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await api.pauseChangefeed('cf1');
    await cluster.tick(1);

    await api.updateChangefeed({ changefeed_id: 'cf1', consistent: { level: 'eventual', storage: 'local:///data/redo' } });
    await api.updateChangefeed({ changefeed_id: 'cf1', consistent: { max_log_size: 128 } });
    expect((await api.getChangefeed('cf1')).config.consistent).toEqual({
      ...DEFAULT_CONSISTENT_CONFIG,
      level: 'eventual',
      max_log_size: 128,
      storage: 'local:///data/redo'
    });

    await expect(api.updateChangefeed({ changefeed_id: 'cf1', consistent: { storage: 's3://' } })).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrInvalidReplicaConfig, details: 'redo storage s3 requires a bucket: s3://' }
    });
    expect((await api.getChangefeed('cf1')).config.consistent.storage).toBe('local:///data/redo');
  });

  it('lists task status per capture', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(2);

    const [lo, hi] = cluster.nodes.map((n) => n.id).sort();
    const { task_status } = await api.getChangefeed('cf1');
    expect(task_status.sort((a, b) => a.capture_id.localeCompare(b.capture_id))).toEqual([
      { capture_id: lo, table_ids: [1, 3] },
      { capture_id: hi, table_ids: [2, 4] }
    ]);
    expect((await api.listProcessors()).length).toBe(2);
  });

  it('describes processors', async () => {
    cluster = await TestCluster.start({ captures: 3, tables: sourceTables(1, 2) });
    const api = cluster.api();
    await api.createChangefeed({ changefeed_id: 'cf1', sink_uri: 'blackhole://' });
    await cluster.tick(2);

    const [first, , idle] = cluster.nodes.map((n) => n.id).sort();
    expect(await api.getProcessor('cf1', first)).toEqual({
      status: 'running',
      checkpoint_ts: T0,
      resolved_ts: T0,
      table_ids: [1],
      error: undefined
    });
    expect(await api.getProcessor('cf1', idle)).toEqual({
      status: 'stopped',
      checkpoint_ts: T0,
      resolved_ts: T0,
      table_ids: []
    });
    await expect(api.getProcessor('cf1', 'gone')).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrCaptureNotExist }
    });
  });

  it('reports server status', async () => {
    cluster = await TestCluster.start();
    await cluster.tick(1);

    expect(await cluster.api(cluster.nodes[1]).status()).toEqual({
      version: 'test',
      git_hash: 'test-hash',
      id: cluster.nodes[1].id,
      pid: process.pid,
      is_owner: false
    });
    expect((await cluster.api(cluster.nodes[0]).status()).is_owner).toBe(true);
  });

  it('fails the health check when the store is unreachable', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    await api.health();

    cluster.storage.unavailable = new Error('connection reset');
    await expect(api.health()).rejects.toMatchObject({
      errorData: { code: ErrorCode.ErrStorageUnavailable, status: 500 }
    });
    cluster.storage.unavailable = null;
  });

  it('changes the log level', async () => {
    cluster = await TestCluster.start();
    const api = cluster.api();
    const previous = logger.level;

    try {
      api.setLogLevel('debug');
      expect(logger.level).toBe('debug');
      expect(() => api.setLogLevel('loud')).toThrowError(ValidationError);
    } finally {
      logger.level = previous;
    }
  });
});
