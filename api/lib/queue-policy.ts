/**
 * Queue ordering: highest priority first, FIFO inside a priority tier.
 *
 * The store orders with QUEUE_ORDER_SQL; the functions below are the same
 * ordering over an in-memory entry set and carry no hidden state.
 */
import type { QueueEntry } from '@shared/types/simulation';

/** ORDER BY clause equivalent to compareQueueEntries, for the `queue` table. */
export const QUEUE_ORDER_SQL = 'priority DESC, seq ASC';

export function compareQueueEntries(a: QueueEntry, b: QueueEntry): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return a.seq - b.seq;
}

/** Entries in claim order. Does not mutate the input. */
export function orderQueue(entries: readonly QueueEntry[]): QueueEntry[] {
  return [...entries].sort(compareQueueEntries);
}

/** The entry the next claim would take, or undefined for an empty queue. */
export function selectNext(entries: readonly QueueEntry[]): QueueEntry | undefined {
  let best: QueueEntry | undefined;
  for (const entry of entries) {
    if (best === undefined || compareQueueEntries(entry, best) < 0) best = entry;
  }
  return best;
}

/**
 * Priority for a simulation put back after its simulator went silent, so it
 * is not starved behind work queued while it was running.
 */
export function boostPriority(priority: number, boost: number): number {
  return priority + Math.max(0, boost);
}
