import { describe, test } from 'node:test';
import assert from 'node:assert';
import * as path from 'path';
import { loadConfig } from './config';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    assert.deepStrictEqual(loadConfig({}), {
      dbPath: path.resolve(process.cwd(), 'data', 'simulations.db'),
      busyTimeoutMs: 5000,
      simulatorCommand: 'ssbgp-simulator',
      pollIntervalMs: 5000,
      heartbeatIntervalMs: 15_000,
      staleRunThresholdMs: 120_000,
      staleScanIntervalMs: 45_000,
      requeuePriorityBoost: 1,
    });
  });

  test('reads numeric and optional values from strings', () => {
    const config = loadConfig({
      SIMULATIONS_DB_PATH: '/var/lib/sims/queue.db',
      SIMULATOR_ID: '  worker-7 ',
      SIMULATOR_TIMEOUT_MS: '600000',
      REQUEUE_PRIORITY_BOOST: '0',
    });
    assert.strictEqual(config.dbPath, '/var/lib/sims/queue.db');
    assert.strictEqual(config.simulatorId, 'worker-7');
    assert.strictEqual(config.simulatorTimeoutMs, 600_000);
    assert.strictEqual(config.requeuePriorityBoost, 0);
  });

  test('treats blank variables as unset', () => {
    const config = loadConfig({ SIMULATOR_ID: '', SIMULATOR_TIMEOUT_MS: '  ' });
    assert.strictEqual(config.simulatorId, undefined);
    assert.strictEqual(config.simulatorTimeoutMs, undefined);
  });

  test('lists every invalid variable', () => {
    assert.throws(
      () => loadConfig({ SQLITE_BUSY_TIMEOUT_MS: 'soon', STALE_RUN_THRESHOLD_MS: '-5' }),
      /Invalid configuration: SQLITE_BUSY_TIMEOUT_MS: .*; STALE_RUN_THRESHOLD_MS: /
    );
  });
});
