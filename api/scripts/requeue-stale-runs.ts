#!/usr/bin/env npx tsx
/**
 * Requeue, once, every running simulation whose simulator has not sent a
 * heartbeat within STALE_RUN_THRESHOLD_MS. Suitable for cron; simulator
 * workers run the same scan in the background.
 *
 * Usage:
 *   npx tsx api/scripts/requeue-stale-runs.ts
 */

import 'dotenv/config';
import { loadConfig } from '../lib/config';
import { closeDb } from '../lib/db';
import { getSimulationStore } from '../lib/simulation-store';
import { scanOnce } from '../lib/stale-run-scanner';

function main() {
  const config = loadConfig();
  try {
    const requeued = scanOnce(getSimulationStore(), {
      thresholdMs: config.staleRunThresholdMs,
      priorityBoost: config.requeuePriorityBoost,
    });
    console.log(`Requeued ${requeued.length} stale run(s)`);
    for (const run of requeued) {
      console.log(`  ${run.simulationId} (was on ${run.simulatorId}, claimed ${run.claimedAt})`);
    }
  } finally {
    closeDb();
  }
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
