import { createLogger } from './logger';
import { boostPriority } from './queue-policy';
import { NotRunningError } from './errors';
import type { SimulationStore } from './simulation-store';
import type { RunningEntry } from '@shared/types/simulation';

const log = createLogger('StaleRunScanner');

const INITIAL_DELAY_MS = 10_000;

export interface StaleRunScanOptions {
  /** Runs whose simulator has not sent a heartbeat for this long are requeued */
  thresholdMs: number;
  /** Added to the claim-time priority of every requeued run */
  priorityBoost: number;
  now?: () => Date;
}

/**
 * Requeue every run whose simulator's heartbeat is older than the threshold.
 * A run that completes or is requeued between the lookup and the requeue is
 * skipped. Returns the runs that were put back.
 */
export function scanOnce(store: SimulationStore, options: StaleRunScanOptions): RunningEntry[] {
  const now = options.now?.() ?? new Date();
  const cutoff = new Date(now.getTime() - options.thresholdMs);
  const requeued: RunningEntry[] = [];
  for (const run of store.findStaleRuns(cutoff)) {
    try {
      store.requeue(run.simulatorId, run.simulationId, boostPriority(run.priority, options.priorityBoost));
      requeued.push(run);
      log.info('Requeued stale run', { simulatorId: run.simulatorId, simulationId: run.simulationId });
    } catch (err) {
      if (err instanceof NotRunningError) continue;
      throw err;
    }
  }
  return requeued;
}

let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
let intervalHandle: ReturnType<typeof setInterval> | null = null;
let scanning = false;

function safeScan(store: SimulationStore, options: StaleRunScanOptions): void {
  if (scanning) return;
  scanning = true;
  try {
    scanOnce(store, options);
  } catch (err) {
    log.warn('Error during scan', { error: err instanceof Error ? err.message : String(err) });
  } finally {
    scanning = false;
  }
}

export function startStaleRunScanner(
  store: SimulationStore,
  options: StaleRunScanOptions & { intervalMs: number; initialDelayMs?: number }
): void {
  if (timeoutHandle || intervalHandle) return;
  log.info('Starting background scanner', { thresholdMs: options.thresholdMs, intervalMs: options.intervalMs });

  timeoutHandle = setTimeout(() => {
    timeoutHandle = null;
    safeScan(store, options);
    intervalHandle = setInterval(() => safeScan(store, options), options.intervalMs);
    intervalHandle.unref();
  }, options.initialDelayMs ?? INITIAL_DELAY_MS);
  timeoutHandle.unref();
}

export function stopStaleRunScanner(): void {
  if (timeoutHandle) {
    clearTimeout(timeoutHandle);
    timeoutHandle = null;
  }
  if (intervalHandle) {
    clearInterval(intervalHandle);
    intervalHandle = null;
    log.info('Stopped');
  }
}
