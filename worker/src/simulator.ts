/**
 * Simulator runtime: registers with the store, then claims, runs and
 * reports simulations until stopped.
 *
 * A zero exit code is reported as complete; anything else (including a
 * runner that throws) puts the simulation back in the queue at the priority
 * it was claimed with. A run that was requeued by someone else while it was
 * executing (the stale-run scanner) is dropped without a report.
 *
 * Failed passes back off: the poll interval doubles per consecutive failure,
 * up to 2^MAX_BACKOFF_EXPONENT times the interval, and resets on completion.
 */

import { createLogger, type Logger } from '../../api/lib/logger';
import { NotRunningError, isTransientStoreError } from '../../api/lib/errors';
import { withRetry, type RetryOptions } from '../../api/lib/retry';
import type { SimulationStore } from '../../api/lib/simulation-store';
import type { SimulationDescriptor } from '@shared/types/simulation';
import { runProcess } from './process';
import type { ProcessResult, RunOutcome, SimulationRunner } from './types';

export const MAX_BACKOFF_EXPONENT = 5;

export interface SimulatorOptions {
  simulatorId: string;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  runner: SimulationRunner;
  retry?: RetryOptions;
}

export interface Simulator {
  readonly simulatorId: string;
  /** One claim → run → report pass. */
  runOnce(): Promise<RunOutcome>;
  /** Poll until stop() is called. Resolves once the current pass finishes. */
  run(): Promise<void>;
  stop(): void;
}

/**
 * Arguments for the simulator binary. A null seed passes no --seed, so the
 * run is non-deterministic; a null report-nodes flag is read as false.
 */
export function buildSimulatorArgs(simulation: SimulationDescriptor): string[] {
  const args = [
    simulation.topology,
    String(simulation.destination),
    '--repetitions', String(simulation.repetitions),
    '--min-delay', String(simulation.minDelay),
    '--max-delay', String(simulation.maxDelay),
    '--threshold', String(simulation.threshold),
  ];
  if (simulation.stubsFile !== '') args.push('--stubs', simulation.stubsFile);
  if (simulation.seed !== null) args.push('--seed', String(simulation.seed));
  if (simulation.reportNodes === true) args.push('--report-nodes');
  args.push('--id', simulation.id);
  return args;
}

/** Runner that spawns `command` with buildSimulatorArgs(). */
export function processRunner(command: string, timeoutMs?: number): SimulationRunner {
  return (simulation) =>
    runProcess(command, buildSimulatorArgs(simulation), timeoutMs ? { timeout: timeoutMs } : {});
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the next pass, given the consecutive failure count. */
export function backoffDelay(pollIntervalMs: number, failures: number): number {
  if (failures <= 0) return pollIntervalMs;
  return pollIntervalMs * 2 ** Math.min(failures - 1, MAX_BACKOFF_EXPONENT);
}

export function createSimulator(store: SimulationStore, options: SimulatorOptions): Simulator {
  const { simulatorId } = options;
  const log: Logger = createLogger('Simulator', { simulatorId });
  let stopped = false;

  const storeCall = <T>(fn: () => T, context: string): Promise<T> =>
    withRetry(fn, options.retry, context, isTransientStoreError);

  async function execute(simulation: SimulationDescriptor): Promise<ProcessResult> {
    try {
      return await options.runner(simulation);
    } catch (err) {
      log.error('Simulation runner failed', {
        simulationId: simulation.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return { exitCode: -1, durationMs: 0 };
    }
  }

  async function runOnce(): Promise<RunOutcome> {
    const simulation = await storeCall(() => store.claimNext(simulatorId), 'claimNext');
    if (!simulation) return 'idle';

    const result = await execute(simulation);
    try {
      if (result.exitCode === 0) {
        await storeCall(() => store.complete(simulatorId, simulation.id, new Date()), 'complete');
        log.info('Simulation finished', { simulationId: simulation.id, durationMs: result.durationMs });
        return 'completed';
      }

      await storeCall(() => store.requeue(simulatorId, simulation.id), 'requeue');
      log.warn('Simulation failed, requeued', { simulationId: simulation.id, exitCode: result.exitCode });
      return 'requeued';
    } catch (err) {
      if (!(err instanceof NotRunningError)) throw err;
      log.warn('Run was reassigned, result dropped', {
        simulationId: simulation.id,
        exitCode: result.exitCode,
      });
      return 'reassigned';
    }
  }

  function heartbeat(): void {
    try {
      store.recordHeartbeat(simulatorId);
    } catch (err) {
      log.warn('Heartbeat failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  async function run(): Promise<void> {
    stopped = false;
    await storeCall(() => store.registerSimulator(simulatorId), 'registerSimulator');
    log.info('Registered');

    const heartbeatHandle = setInterval(heartbeat, options.heartbeatIntervalMs);
    heartbeatHandle.unref();
    try {
      let failures = 0;
      while (!stopped) {
        const outcome = await runOnce();
        if (outcome === 'completed') {
          failures = 0;
          continue;
        }
        if (outcome !== 'idle') failures += 1;
        if (!stopped) await sleep(backoffDelay(options.pollIntervalMs, failures));
      }
    } finally {
      clearInterval(heartbeatHandle);
      log.info('Stopped');
    }
  }

  return {
    simulatorId,
    runOnce,
    run,
    stop() {
      stopped = true;
    },
  };
}
