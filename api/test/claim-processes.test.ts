/**
 * Simulators in separate OS processes claiming from one database file. Each
 * child waits until every child has opened the file, so the claim loops
 * overlap.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { spawn, type ChildProcessByStdio } from 'child_process';
import * as path from 'path';
import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { z } from 'zod';
import { createSimulationStore } from '../lib/simulation-store';
import { makeSimulation, openTempDb } from './helpers';

const ROOT = path.resolve(__dirname, '../..');
const CLAIM_WORKER = path.join(__dirname, 'fixtures', 'claim-worker.ts');
const QUEUED = 200;
const SIMULATORS = ['proc-a', 'proc-b', 'proc-c', 'proc-d'];

const claimedSchema = z.array(z.string());

interface ClaimWorker {
  proc: ChildProcessByStdio<Writable, Readable, null>;
  ready: Promise<void>;
  done: Promise<string[]>;
}

function startClaimWorker(file: string, simulatorId: string): ClaimWorker {
  const proc = spawn(process.execPath, ['--import', 'tsx', CLAIM_WORKER, file, simulatorId], {
    cwd: ROOT,
    stdio: ['pipe', 'pipe', 'inherit'],
  });
  const lines = readline.createInterface({ input: proc.stdout });

  const ready = new Promise<void>((resolve, reject) => {
    lines.on('line', (line) => {
      if (line === 'READY') resolve();
    });
    proc.on('error', reject);
    proc.on('close', (code) => reject(new Error(`${simulatorId} exited with ${code} before it was ready`)));
  });

  const done = new Promise<string[]>((resolve, reject) => {
    let claimed: string[] | null = null;
    lines.on('line', (line) => {
      if (line.startsWith('CLAIMED ')) claimed = claimedSchema.parse(JSON.parse(line.slice('CLAIMED '.length)));
    });
    proc.on('error', reject);
    proc.on('close', (code) => {
      if (code === 0 && claimed !== null) resolve(claimed);
      else reject(new Error(`${simulatorId} exited with ${code} without reporting its claims`));
    });
  });

  return { proc, ready, done };
}

describe('claims from separate processes', () => {
  test('every queued simulation is claimed exactly once', { timeout: 60_000 }, async () => {
    const { db, file, cleanup } = openTempDb();
    try {
      const store = createSimulationStore(db);
      for (const simulatorId of SIMULATORS) store.registerSimulator(simulatorId);
      const ids = Array.from({ length: QUEUED }, (_, i) => `s-${i}`);
      store.enqueueAll(ids.map((id) => makeSimulation(id)), 0);

      const workers = SIMULATORS.map((simulatorId) => startClaimWorker(file, simulatorId));
      await Promise.all(workers.map((w) => w.ready));
      for (const w of workers) w.proc.stdin.end('go\n');
      const results = await Promise.all(workers.map((w) => w.done));

      const claimed = results.flat();
      assert.strictEqual(claimed.length, QUEUED);
      assert.strictEqual(new Set(claimed).size, QUEUED);
      assert.deepStrictEqual([...claimed].sort(), [...ids].sort());
      assert.strictEqual(store.queueDepth(), 0);
      assert.strictEqual(store.listRunning().length, QUEUED);
      SIMULATORS.forEach((simulatorId, i) => {
        const running = store.listRunning(simulatorId).map((r) => r.simulationId);
        assert.deepStrictEqual(running.sort(), [...results[i]].sort());
      });
    } finally {
      cleanup();
    }
  });
});
