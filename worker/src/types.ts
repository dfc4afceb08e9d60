import type { SimulationDescriptor } from '@shared/types/simulation';

export interface ProcessResult {
  exitCode: number;
  durationMs: number;
}

/** Runs one simulation to the end. Resolves with the process outcome. */
export type SimulationRunner = (simulation: SimulationDescriptor) => Promise<ProcessResult>;

/** What one pass of the claim loop did. */
export type RunOutcome = 'idle' | 'completed' | 'requeued' | 'reassigned';
