#!/usr/bin/env npx tsx
/**
 * Generate one simulation per (topology, destination) pair and add them all
 * to the queue with the given priority.
 *
 * Usage:
 *   npx tsx api/scripts/generate-simulations.ts topologies.txt destinations.txt 10 --c=50
 */

import 'dotenv/config';
import * as path from 'path';
import { parseGeneratorArgs, GENERATE_USAGE } from '../lib/cli-args';
import { loadConfig } from '../lib/config';
import { openDb } from '../lib/db';
import {
  findMissingTopologies,
  generateSimulations,
  readDestinations,
  readTopologies,
} from '../lib/generator';
import { createSimulationStore } from '../lib/simulation-store';

async function main() {
  const config = loadConfig();
  const parsed = parseGeneratorArgs(process.argv.slice(2), { dbPath: config.dbPath });
  if (!parsed.success) {
    console.error(parsed.error);
    console.error(GENERATE_USAGE);
    process.exit(1);
  }
  const options = parsed.data;

  const topologies = await readTopologies(options.topologiesFile);
  const destinations = await readDestinations(options.destinationsFile);
  console.log(`Found ${topologies.length} topologies and ${destinations.length} destinations`);

  const missing = await findMissingTopologies(topologies);
  if (missing.length > 0) {
    console.error(`Topology files not found: ${missing.join(', ')}`);
    process.exit(1);
  }

  console.log('Generating simulations...');
  const simulations = generateSimulations({
    topologies,
    destinations,
    repetitions: options.repetitions,
    minDelay: options.minDelay,
    maxDelay: options.maxDelay,
    threshold: options.threshold,
    reportNodes: options.reportNodes,
  });

  const db = openDb(path.resolve(process.cwd(), options.dbPath), { busyTimeoutMs: config.busyTimeoutMs });
  try {
    createSimulationStore(db).enqueueAll(simulations, options.priority);
  } finally {
    db.close();
  }

  console.log(`Done! ${simulations.length} simulations were added with priority ${options.priority}`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
