import { describe, test } from 'node:test';
import assert from 'node:assert';
import { boostPriority, compareQueueEntries, orderQueue, selectNext } from './queue-policy';
import type { QueueEntry } from '@shared/types/simulation';

const entries: QueueEntry[] = [
  { simulationId: 'first-5', priority: 5, seq: 1 },
  { simulationId: 'only-1', priority: 1, seq: 2 },
  { simulationId: 'second-5', priority: 5, seq: 3 },
  { simulationId: 'only-3', priority: 3, seq: 4 },
];

describe('queue policy', () => {
  test('orders by priority descending, then insertion order', () => {
    assert.deepStrictEqual(
      orderQueue(entries).map((e) => e.simulationId),
      ['first-5', 'second-5', 'only-3', 'only-1']
    );
  });

  test('orderQueue does not mutate its input', () => {
    const copy = [...entries];
    orderQueue(entries);
    assert.deepStrictEqual(entries, copy);
  });

  test('selectNext picks the head of the ordered queue', () => {
    assert.strictEqual(selectNext(entries)?.simulationId, 'first-5');
    assert.strictEqual(selectNext([]), undefined);
  });

  test('negative priorities sort below the default tier', () => {
    const a: QueueEntry = { simulationId: 'a', priority: -1, seq: 1 };
    const b: QueueEntry = { simulationId: 'b', priority: 0, seq: 2 };
    assert.ok(compareQueueEntries(b, a) < 0);
  });

  test('boostPriority never lowers a priority', () => {
    assert.strictEqual(boostPriority(3, 2), 5);
    assert.strictEqual(boostPriority(3, -4), 3);
  });
});
