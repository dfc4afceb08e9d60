import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type Database from 'better-sqlite3';
import { openDb } from '../lib/db';
import type { SimulationDescriptor } from '@shared/types/simulation';

/** A fresh database file in its own temp directory. */
export function tempDbFile(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'simulations-test-'));
  return path.join(dir, 'simulations.db');
}

export function openTempDb(): { db: Database.Database; file: string; cleanup: () => void } {
  const file = tempDbFile();
  const db = openDb(file);
  return {
    db,
    file,
    cleanup: () => {
      db.close();
      fs.rmSync(path.dirname(file), { recursive: true, force: true });
    },
  };
}

export function makeSimulation(id: string, overrides: Partial<SimulationDescriptor> = {}): SimulationDescriptor {
  return {
    id,
    topology: 'topologies/net-a.topo',
    destination: 7,
    repetitions: 10,
    minDelay: 10,
    maxDelay: 100,
    threshold: 2_000_000,
    stubsFile: 'stubs/net-a.stubs',
    seed: null,
    reportNodes: false,
    ...overrides,
  };
}
