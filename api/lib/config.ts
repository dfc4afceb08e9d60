/**
 * Process configuration read from the environment.
 * Entry points load `.env` through `dotenv/config` before calling loadConfig().
 */
import * as path from 'path';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  SIMULATIONS_DB_PATH: z.string().min(1).default(path.join('data', 'simulations.db')),
  SQLITE_BUSY_TIMEOUT_MS: positiveInt.default(5000),
  SIMULATOR_ID: z.string().trim().min(1).optional(),
  SIMULATOR_COMMAND: z.string().trim().min(1).default('ssbgp-simulator'),
  SIMULATOR_POLL_INTERVAL_MS: positiveInt.default(5000),
  SIMULATOR_HEARTBEAT_INTERVAL_MS: positiveInt.default(15_000),
  SIMULATOR_TIMEOUT_MS: positiveInt.optional(),
  STALE_RUN_THRESHOLD_MS: positiveInt.default(120_000),
  STALE_SCAN_INTERVAL_MS: positiveInt.default(45_000),
  REQUEUE_PRIORITY_BOOST: z.coerce.number().int().min(0).default(1),
});

export interface Config {
  dbPath: string;
  busyTimeoutMs: number;
  simulatorId?: string;
  simulatorCommand: string;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  simulatorTimeoutMs?: number;
  staleRunThresholdMs: number;
  staleScanIntervalMs: number;
  requeuePriorityBoost: number;
}

/**
 * Parse and validate configuration. Throws with every offending variable
 * listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Blank variables (e.g. `SIMULATOR_ID=` in .env) count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const messages = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${messages.join('; ')}`);
  }
  const e = result.data;
  return {
    dbPath: path.resolve(process.cwd(), e.SIMULATIONS_DB_PATH),
    busyTimeoutMs: e.SQLITE_BUSY_TIMEOUT_MS,
    ...(e.SIMULATOR_ID !== undefined && { simulatorId: e.SIMULATOR_ID }),
    simulatorCommand: e.SIMULATOR_COMMAND,
    pollIntervalMs: e.SIMULATOR_POLL_INTERVAL_MS,
    heartbeatIntervalMs: e.SIMULATOR_HEARTBEAT_INTERVAL_MS,
    ...(e.SIMULATOR_TIMEOUT_MS !== undefined && { simulatorTimeoutMs: e.SIMULATOR_TIMEOUT_MS }),
    staleRunThresholdMs: e.STALE_RUN_THRESHOLD_MS,
    staleScanIntervalMs: e.STALE_SCAN_INTERVAL_MS,
    requeuePriorityBoost: e.REQUEUE_PRIORITY_BOOST,
  };
}
