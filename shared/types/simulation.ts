/**
 * Shared types for network-simulation descriptors and their lifecycle.
 *
 * The api/ store and the worker/ simulator runtime both import from here so
 * any field change becomes a compile error in both.
 */

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

/**
 * Immutable parameter bundle for one simulation. Created once by the
 * descriptor generator and never updated afterwards.
 */
export interface SimulationDescriptor {
  id: string;
  /** Topology file the simulator loads */
  topology: string;
  /** Destination node id */
  destination: number;
  /** Number of repetitions, always > 0 */
  repetitions: number;
  /** Minimum inter-event delay */
  minDelay: number;
  /** Maximum inter-event delay, always >= minDelay */
  maxDelay: number;
  /** Convergence threshold */
  threshold: number;
  stubsFile: string;
  /** null means a non-deterministic run */
  seed: number | null;
  /** null is read as false */
  reportNodes: boolean | null;
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

export type SimulationState = 'QUEUED' | 'RUNNING' | 'COMPLETE';

export interface QueueEntry {
  simulationId: string;
  priority: number;
  /** Insertion order; strictly increasing across inserts */
  seq: number;
}

export interface RunningEntry {
  simulatorId: string;
  simulationId: string;
  /** Priority the simulation had when it was claimed */
  priority: number;
  claimedAt: string;
}

export interface CompleteEntry {
  simulatorId: string;
  simulationId: string;
  finishedAt: string;
}
