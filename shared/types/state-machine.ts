/**
 * Simulation lifecycle state machine.
 *
 * Valid transitions:
 *   QUEUED   → RUNNING   (claim)
 *   RUNNING  → COMPLETE  (finish report)
 *   RUNNING  → QUEUED    (failure report or liveness loss)
 *   COMPLETE → QUEUED    (explicit re-run request)
 *
 * There is no QUEUED → COMPLETE edge and no state that forbids re-queueing.
 */

import type { SimulationState } from './simulation';

const VALID_TRANSITIONS: Record<SimulationState, readonly SimulationState[]> = {
  QUEUED:   ['RUNNING'],
  RUNNING:  ['COMPLETE', 'QUEUED'],
  COMPLETE: ['QUEUED'],
};

/** Every simulation starts here. */
export const INITIAL_STATE: SimulationState = 'QUEUED';

/**
 * Check if a simulation state transition is valid.
 *
 * @returns true if transitioning from `from` to `to` is allowed
 */
export function canTransition(from: SimulationState, to: SimulationState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** States reachable from `from` in one step. */
export function nextStates(from: SimulationState): readonly SimulationState[] {
  return VALID_TRANSITIONS[from];
}
