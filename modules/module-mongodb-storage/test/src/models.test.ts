import { changefeed, storage } from '@changeplane/service-core';
import { ConsistentLevel } from '@changeplane/service-types';
import { describe, expect, test } from 'vitest';

import {
  changefeedFromDocument,
  changefeedToDocument,
  processorFromDocument,
  processorToDocument,
  taskId
} from '../../src/storage/implementation/models.js';

describe('documents', () => {
  test('stores a changefeed under its id', () => {
    const info: storage.ChangefeedInfo = {
      id: 'cf1',
      sink_uri: 'blackhole://',
      config: {
        ignore_ineligible_table: false,
        consistent: { ...changefeed.DEFAULT_CONSISTENT_CONFIG, level: ConsistentLevel.EVENTUAL, storage: 's3://redo-bucket/cf1' }
      },
      state: storage.ChangefeedState.NORMAL,
      error: null,
      create_time: new Date('2024-01-01T00:00:00Z'),
      start_ts: 1_000,
      table_ids: [1, 2],
      checkpoint_ts: 1_000,
      removed_at: null,
      updated_at: new Date('2024-01-01T00:00:00Z')
    };

    const doc = changefeedToDocument(info);
    expect(doc._id).toBe('cf1');
    expect('id' in doc).toBe(false);
    expect(changefeedFromDocument(doc)).toEqual(info);
  });

  test('keys processors by changefeed and capture', () => {
    const info: storage.ProcessorInfo = {
      changefeed_id: 'cf1',
      capture_id: 'capture-a',
      table_ids: [3],
      status: storage.ProcessorStatus.RUNNING,
      checkpoint_ts: 5,
      resolved_ts: 6,
      error: null,
      updated_at: new Date('2024-01-01T00:00:00Z')
    };

    const doc = processorToDocument(info);
    expect(doc._id).toBe('cf1/capture-a');
    expect(processorFromDocument(doc)).toEqual(info);
  });

  test('keys table tasks by changefeed and table', () => {
    expect(taskId('cf1', 12)).toBe('cf1/12');
  });
});
