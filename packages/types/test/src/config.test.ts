import { describe, expect, test } from 'vitest';

import { configFile } from '../../src/index.js';

describe('config codec', () => {
  test('decodes ports and numbers given as strings', () => {
    const decoded = configFile.controlPlaneConfig.decode({
      port: '8301',
      capture: {
        capture_ttl_ms: '5000',
        owner_tick_interval_ms: 100
      }
    });

    expect(decoded.port).toBe(8301);
    expect(decoded.capture?.capture_ttl_ms).toBe(5000);
    expect(decoded.capture?.owner_tick_interval_ms).toBe(100);
  });

  test('keeps storage specific fields', () => {
    const decoded = configFile.controlPlaneConfig.decode({
      storage: {
        type: 'mongodb',
        uri: 'mongodb://localhost:27017/changeplane'
      }
    });
    expect(decoded.storage).toEqual({ type: 'mongodb', uri: 'mongodb://localhost:27017/changeplane' });
  });

  test('decodes source tables', () => {
    const decoded = configFile.controlPlaneConfig.decode({
      source: {
        tables: [
          { table_id: 11, schema: 'test', name: 'orders' },
          { table_id: 12, schema: 'test', name: 'audit_log', eligible: false }
        ]
      }
    });
    expect(decoded.source?.tables?.map((table) => table.table_id)).toEqual([11, 12]);
    expect(decoded.source?.tables?.[1].eligible).toBe(false);
  });
});
