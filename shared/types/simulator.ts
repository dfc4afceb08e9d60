/**
 * Shared types for simulator (worker process) registration.
 */

export interface SimulatorInfo {
  simulatorId: string;
  registeredAt: string;
  /** ISO timestamp of the last heartbeat, null if none was ever recorded */
  lastHeartbeat: string | null;
}
