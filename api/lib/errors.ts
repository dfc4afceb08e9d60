import type { SimulationState } from '@shared/types/simulation';

/** Base class for every error the simulation store reports. */
export class SimulationStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A simulation with this id already exists with other content, or is already waiting/running. */
export class DuplicateIdError extends SimulationStoreError {
  constructor(readonly simulationId: string, detail = 'already exists') {
    super(`Simulation ${simulationId} ${detail}`);
  }
}

/** complete/requeue called for a (simulator, simulation) pair with no running entry. */
export class NotRunningError extends SimulationStoreError {
  constructor(readonly simulatorId: string, readonly simulationId: string) {
    super(`Simulation ${simulationId} is not running on simulator ${simulatorId}`);
  }
}

/** A simulator still referenced by running or complete entries cannot be deleted. */
export class ReferentialError extends SimulationStoreError {
  constructor(readonly simulatorId: string) {
    super(`Simulator ${simulatorId} is referenced by running or complete simulations`);
  }
}

/** A referenced simulation or simulator does not exist. */
export class EntryNotFoundError extends SimulationStoreError {
  constructor(readonly entity: 'simulation' | 'simulator', readonly id: string) {
    super(`${entity === 'simulation' ? 'Simulation' : 'Simulator'} ${id} not found`);
  }
}

export class InvalidTransitionError extends SimulationStoreError {
  constructor(
    readonly simulationId: string,
    readonly from: SimulationState | null,
    readonly to: SimulationState,
  ) {
    super(`Simulation ${simulationId} cannot move from ${from ?? 'no state'} to ${to}`);
  }
}

/** Underlying persistence failure. `code` is the SQLite result code when known. */
export class StoreError extends SimulationStoreError {
  constructor(message: string, readonly code?: string, readonly original?: unknown) {
    super(message);
  }

  /** True for lock contention that a caller may retry. */
  get isTransient(): boolean {
    return this.code === 'SQLITE_BUSY' || this.code === 'SQLITE_LOCKED';
  }
}

/** Retry predicate for withRetry(): only transient store errors. */
export function isTransientStoreError(err: unknown): boolean {
  return err instanceof StoreError && err.isTransient;
}
