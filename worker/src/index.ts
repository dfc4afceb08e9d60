import 'dotenv/config';
import { v4 as uuidv4 } from 'uuid';
import { loadConfig } from '../../api/lib/config';
import { closeDb } from '../../api/lib/db';
import { createLogger } from '../../api/lib/logger';
import { getSimulationStore } from '../../api/lib/simulation-store';
import { startStaleRunScanner, stopStaleRunScanner } from '../../api/lib/stale-run-scanner';
import { createSimulator, processRunner } from './simulator';

/**
 * Simulator worker process.
 *
 * 1. Registers under SIMULATOR_ID (or a fresh uuid)
 * 2. Claims queued simulations one at a time and runs SIMULATOR_COMMAND
 * 3. Reports complete on exit 0, requeues otherwise
 * 4. Requeues runs of peers that stopped sending heartbeats
 */

const log = createLogger('Worker');

async function main(): Promise<void> {
  const config = loadConfig();
  const store = getSimulationStore();
  const simulator = createSimulator(store, {
    simulatorId: config.simulatorId ?? uuidv4(),
    pollIntervalMs: config.pollIntervalMs,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    runner: processRunner(config.simulatorCommand, config.simulatorTimeoutMs),
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, finishing current simulation`);
    simulator.stop();
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  startStaleRunScanner(store, {
    thresholdMs: config.staleRunThresholdMs,
    priorityBoost: config.requeuePriorityBoost,
    intervalMs: config.staleScanIntervalMs,
  });

  try {
    await simulator.run();
  } finally {
    stopStaleRunScanner();
    closeDb();
  }
}

main().catch((err: unknown) => {
  log.error('Fatal error', { error: err instanceof Error ? err.stack ?? err.message : String(err) });
  process.exit(1);
});
