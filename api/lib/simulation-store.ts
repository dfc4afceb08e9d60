import type Database from 'better-sqlite3';
import { getDb } from './db';
import {
  DuplicateIdError,
  EntryNotFoundError,
  InvalidTransitionError,
  NotRunningError,
  ReferentialError,
  SimulationStoreError,
  StoreError,
} from './errors';
import { createLogger } from './logger';
import { QUEUE_ORDER_SQL } from './queue-policy';
import { canTransition } from '@shared/types/state-machine';
import type {
  CompleteEntry,
  QueueEntry,
  RunningEntry,
  SimulationDescriptor,
  SimulationState,
} from '@shared/types/simulation';
import type { SimulatorInfo } from '@shared/types/simulator';

const log = createLogger('SimulationStore');

// ─── Rows ────────────────────────────────────────────────────────────────────

interface SimulationRow {
  id: string;
  topology: string;
  destination: number;
  repetitions: number;
  min_delay: number;
  max_delay: number;
  threshold: number;
  stubs_file: string;
  seed: number | null;
  reportnodes: number | null;
}

interface SimulatorRow {
  id: string;
  registered_at: string;
  last_heartbeat: string | null;
}

interface QueueRow {
  id: string;
  priority: number;
  seq: number;
}

interface RunningRow {
  simulator_id: string;
  id: string;
  priority: number;
  claimed_at: string;
}

interface CompleteRow {
  simulator_id: string;
  id: string;
  finish_datetime: string;
}

function rowToSimulation(row: SimulationRow): SimulationDescriptor {
  return {
    id: row.id,
    topology: row.topology,
    destination: row.destination,
    repetitions: row.repetitions,
    minDelay: row.min_delay,
    maxDelay: row.max_delay,
    threshold: row.threshold,
    stubsFile: row.stubs_file,
    seed: row.seed,
    reportNodes: row.reportnodes == null ? null : row.reportnodes !== 0,
  };
}

function rowToSimulator(row: SimulatorRow): SimulatorInfo {
  return {
    simulatorId: row.id,
    registeredAt: row.registered_at,
    lastHeartbeat: row.last_heartbeat,
  };
}

function rowToQueueEntry(row: QueueRow): QueueEntry {
  return { simulationId: row.id, priority: row.priority, seq: row.seq };
}

function rowToRunningEntry(row: RunningRow): RunningEntry {
  return {
    simulatorId: row.simulator_id,
    simulationId: row.id,
    priority: row.priority,
    claimedAt: row.claimed_at,
  };
}

function rowToCompleteEntry(row: CompleteRow): CompleteEntry {
  return { simulatorId: row.simulator_id, simulationId: row.id, finishedAt: row.finish_datetime };
}

/** SQLite cannot bind booleans. */
function toSqlBoolean(value: boolean | null): number | null {
  if (value == null) return null;
  return value ? 1 : 0;
}

export function sameDescriptor(a: SimulationDescriptor, b: SimulationDescriptor): boolean {
  return (
    a.id === b.id &&
    a.topology === b.topology &&
    a.destination === b.destination &&
    a.repetitions === b.repetitions &&
    a.minDelay === b.minDelay &&
    a.maxDelay === b.maxDelay &&
    a.threshold === b.threshold &&
    a.stubsFile === b.stubsFile &&
    a.seed === b.seed &&
    (a.reportNodes ?? false) === (b.reportNodes ?? false)
  );
}

/**
 * Errors of our own taxonomy pass through; anything raised by SQLite becomes
 * a StoreError carrying its result code.
 */
function toStoreError(err: unknown): unknown {
  if (err instanceof SimulationStoreError) return err;
  if (err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('SQLITE_')) {
    return new StoreError(err.message, err.code, err);
  }
  return err;
}

function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toStoreError(err);
  }
}

// ─── Store ───────────────────────────────────────────────────────────────────

export interface SimulationStore {
  enqueue(simulation: SimulationDescriptor, priority: number): QueueEntry;
  enqueueAll(simulations: readonly SimulationDescriptor[], priority: number): QueueEntry[];
  registerSimulator(simulatorId: string, at?: Date): SimulatorInfo;
  recordHeartbeat(simulatorId: string, at?: Date): void;
  claimNext(simulatorId: string, at?: Date): SimulationDescriptor | null;
  complete(simulatorId: string, simulationId: string, timestamp?: Date): CompleteEntry;
  requeue(simulatorId: string, simulationId: string, priority?: number): QueueEntry;
  rerun(simulationId: string, priority: number): QueueEntry;
  deleteSimulation(simulationId: string): boolean;
  deleteSimulator(simulatorId: string): boolean;
  getSimulation(simulationId: string): SimulationDescriptor | null;
  getState(simulationId: string): SimulationState | null;
  getSimulator(simulatorId: string): SimulatorInfo | null;
  listQueue(): QueueEntry[];
  listRunning(simulatorId?: string): RunningEntry[];
  listCompletions(simulationId?: string): CompleteEntry[];
  listSimulators(): SimulatorInfo[];
  queueDepth(): number;
  findStaleRuns(cutoff: Date): RunningEntry[];
}

/**
 * Store over one SQLite connection. Every mutation runs in an IMMEDIATE
 * transaction, so the write lock is held from the first read to commit and
 * concurrent processes on the same file serialize on it.
 */
export function createSimulationStore(db: Database.Database): SimulationStore {
  function simulationRow(id: string): SimulationRow | undefined {
    return db.prepare('SELECT * FROM simulation WHERE id = ?').get(id) as SimulationRow | undefined;
  }

  function simulatorExists(id: string): boolean {
    return db.prepare('SELECT 1 FROM simulator WHERE id = ?').get(id) !== undefined;
  }

  function stateOf(id: string): SimulationState | null {
    if (db.prepare('SELECT 1 FROM running WHERE id = ?').get(id) !== undefined) return 'RUNNING';
    if (db.prepare('SELECT 1 FROM queue WHERE id = ?').get(id) !== undefined) return 'QUEUED';
    if (db.prepare('SELECT 1 FROM complete WHERE id = ?').get(id) !== undefined) return 'COMPLETE';
    return null;
  }

  function runningRow(simulatorId: string, simulationId: string): RunningRow | undefined {
    return db
      .prepare('SELECT * FROM running WHERE simulator_id = ? AND id = ?')
      .get(simulatorId, simulationId) as RunningRow | undefined;
  }

  // Only compared against rows currently queued, which is all FIFO needs
  function insertQueueRow(simulationId: string, priority: number): QueueEntry {
    const { seq } = db
      .prepare('SELECT COALESCE(MAX(seq), 0) + 1 AS seq FROM queue')
      .get() as { seq: number };
    db.prepare('INSERT INTO queue (id, priority, seq) VALUES (?, ?, ?)').run(simulationId, priority, seq);
    return { simulationId, priority, seq };
  }

  function enqueueOne(simulation: SimulationDescriptor, priority: number): QueueEntry {
    const existing = simulationRow(simulation.id);
    if (existing) {
      if (!sameDescriptor(rowToSimulation(existing), simulation)) {
        throw new DuplicateIdError(simulation.id, 'already exists with different parameters');
      }
      // Same descriptor again is a re-run request, valid only once the last run finished
      const state = stateOf(simulation.id);
      if (state === 'QUEUED' || state === 'RUNNING') {
        throw new DuplicateIdError(simulation.id, `is already ${state.toLowerCase()}`);
      }
    } else {
      db.prepare(
        `INSERT INTO simulation (id, topology, destination, repetitions, min_delay, max_delay, threshold, stubs_file, seed, reportnodes)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        simulation.id,
        simulation.topology,
        simulation.destination,
        simulation.repetitions,
        simulation.minDelay,
        simulation.maxDelay,
        simulation.threshold,
        simulation.stubsFile,
        simulation.seed,
        toSqlBoolean(simulation.reportNodes),
      );
    }
    return insertQueueRow(simulation.id, priority);
  }

  function requireRunning(simulatorId: string, simulationId: string): RunningRow {
    const row = runningRow(simulatorId, simulationId);
    if (!row) throw new NotRunningError(simulatorId, simulationId);
    return row;
  }

  return {
    enqueue(simulation, priority) {
      const entry = guard(() => db.transaction(() => enqueueOne(simulation, priority)).immediate());
      log.debug('Enqueued simulation', { simulationId: simulation.id, priority });
      return entry;
    },

    enqueueAll(simulations, priority) {
      const entries = guard(() =>
        db.transaction(() => simulations.map((s) => enqueueOne(s, priority))).immediate()
      );
      log.info('Enqueued simulations', { count: entries.length, priority });
      return entries;
    },

    registerSimulator(simulatorId, at = new Date()) {
      return guard(() => {
        db.prepare(
          'INSERT INTO simulator (id, registered_at, last_heartbeat) VALUES (?, ?, ?) ON CONFLICT(id) DO NOTHING'
        ).run(simulatorId, at.toISOString(), at.toISOString());
        const row = db.prepare('SELECT * FROM simulator WHERE id = ?').get(simulatorId) as SimulatorRow;
        return rowToSimulator(row);
      });
    },

    recordHeartbeat(simulatorId, at = new Date()) {
      const result = guard(() =>
        db.prepare('UPDATE simulator SET last_heartbeat = ? WHERE id = ?').run(at.toISOString(), simulatorId)
      );
      if (result.changes === 0) throw new EntryNotFoundError('simulator', simulatorId);
    },

    claimNext(simulatorId, at = new Date()) {
      const claimed = guard(() =>
        db.transaction((): SimulationDescriptor | null => {
          if (!simulatorExists(simulatorId)) throw new EntryNotFoundError('simulator', simulatorId);
          const head = db
            .prepare(`SELECT id, priority, seq FROM queue ORDER BY ${QUEUE_ORDER_SQL} LIMIT 1`)
            .get() as QueueRow | undefined;
          if (!head) return null;
          db.prepare('DELETE FROM queue WHERE id = ?').run(head.id);
          db.prepare('INSERT INTO running (simulator_id, id, priority, claimed_at) VALUES (?, ?, ?, ?)')
            .run(simulatorId, head.id, head.priority, at.toISOString());
          const row = simulationRow(head.id);
          if (!row) throw new EntryNotFoundError('simulation', head.id);
          return rowToSimulation(row);
        }).immediate()
      );
      if (claimed) {
        log.info('Claimed simulation', { simulatorId, simulationId: claimed.id });
      }
      return claimed;
    },

    complete(simulatorId, simulationId, timestamp = new Date()) {
      const entry = guard(() =>
        db.transaction((): CompleteEntry => {
          requireRunning(simulatorId, simulationId);
          db.prepare('DELETE FROM running WHERE simulator_id = ? AND id = ?').run(simulatorId, simulationId);
          db.prepare(
            `INSERT INTO complete (simulator_id, id, finish_datetime) VALUES (?, ?, ?)
             ON CONFLICT(simulator_id, id) DO UPDATE SET finish_datetime = excluded.finish_datetime`
          ).run(simulatorId, simulationId, timestamp.toISOString());
          return { simulatorId, simulationId, finishedAt: timestamp.toISOString() };
        }).immediate()
      );
      log.info('Completed simulation', { simulatorId, simulationId });
      return entry;
    },

    requeue(simulatorId, simulationId, priority) {
      const entry = guard(() =>
        db.transaction((): QueueEntry => {
          const running = requireRunning(simulatorId, simulationId);
          db.prepare('DELETE FROM running WHERE simulator_id = ? AND id = ?').run(simulatorId, simulationId);
          return insertQueueRow(simulationId, priority ?? running.priority);
        }).immediate()
      );
      log.warn('Requeued simulation', { simulatorId, simulationId, priority: entry.priority });
      return entry;
    },

    rerun(simulationId, priority) {
      const entry = guard(() =>
        db.transaction((): QueueEntry => {
          if (!simulationRow(simulationId)) throw new EntryNotFoundError('simulation', simulationId);
          const state = stateOf(simulationId);
          // RUNNING → QUEUED is a requeue, not a re-run
          if (state !== 'COMPLETE' || !canTransition(state, 'QUEUED')) {
            throw new InvalidTransitionError(simulationId, state, 'QUEUED');
          }
          return insertQueueRow(simulationId, priority);
        }).immediate()
      );
      log.info('Re-run requested', { simulationId, priority });
      return entry;
    },

    deleteSimulation(simulationId) {
      const result = guard(() =>
        db.transaction(() => db.prepare('DELETE FROM simulation WHERE id = ?').run(simulationId)).immediate()
      );
      return result.changes > 0;
    },

    deleteSimulator(simulatorId) {
      try {
        const result = db.transaction(() => {
          const { refs } = db
            .prepare(
              `SELECT (SELECT COUNT(*) FROM running WHERE simulator_id = ?) +
                      (SELECT COUNT(*) FROM complete WHERE simulator_id = ?) AS refs`
            )
            .get(simulatorId, simulatorId) as { refs: number };
          if (refs > 0) throw new ReferentialError(simulatorId);
          return db.prepare('DELETE FROM simulator WHERE id = ?').run(simulatorId);
        }).immediate();
        return result.changes > 0;
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
          throw new ReferentialError(simulatorId);
        }
        throw toStoreError(err);
      }
    },

    getSimulation(simulationId) {
      const row = guard(() => simulationRow(simulationId));
      return row ? rowToSimulation(row) : null;
    },

    getState(simulationId) {
      return guard(() => stateOf(simulationId));
    },

    getSimulator(simulatorId) {
      const row = guard(
        () => db.prepare('SELECT * FROM simulator WHERE id = ?').get(simulatorId) as SimulatorRow | undefined
      );
      return row ? rowToSimulator(row) : null;
    },

    listQueue() {
      const rows = guard(
        () => db.prepare(`SELECT id, priority, seq FROM queue ORDER BY ${QUEUE_ORDER_SQL}`).all() as QueueRow[]
      );
      return rows.map(rowToQueueEntry);
    },

    listRunning(simulatorId) {
      const rows = guard(() =>
        simulatorId === undefined
          ? (db.prepare('SELECT * FROM running ORDER BY claimed_at ASC').all() as RunningRow[])
          : (db
              .prepare('SELECT * FROM running WHERE simulator_id = ? ORDER BY claimed_at ASC')
              .all(simulatorId) as RunningRow[])
      );
      return rows.map(rowToRunningEntry);
    },

    listCompletions(simulationId) {
      const rows = guard(() =>
        simulationId === undefined
          ? (db.prepare('SELECT * FROM complete ORDER BY finish_datetime ASC').all() as CompleteRow[])
          : (db
              .prepare('SELECT * FROM complete WHERE id = ? ORDER BY finish_datetime ASC')
              .all(simulationId) as CompleteRow[])
      );
      return rows.map(rowToCompleteEntry);
    },

    listSimulators() {
      const rows = guard(() => db.prepare('SELECT * FROM simulator ORDER BY id ASC').all() as SimulatorRow[]);
      return rows.map(rowToSimulator);
    },

    queueDepth() {
      const row = guard(() => db.prepare('SELECT COUNT(*) AS count FROM queue').get() as { count: number });
      return row.count;
    },

    findStaleRuns(cutoff) {
      const rows = guard(
        () =>
          db
            .prepare(
              `SELECT r.* FROM running r
               JOIN simulator s ON s.id = r.simulator_id
               WHERE COALESCE(s.last_heartbeat, s.registered_at) < ?
               ORDER BY r.claimed_at ASC`
            )
            .all(cutoff.toISOString()) as RunningRow[]
      );
      return rows.map(rowToRunningEntry);
    },
  };
}

let store: SimulationStore | null = null;

/** Store over the process-wide connection from getDb(). */
export function getSimulationStore(): SimulationStore {
  if (!store) store = createSimulationStore(getDb());
  return store;
}
