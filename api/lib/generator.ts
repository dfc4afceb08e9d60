/**
 * Descriptor generator: builds one simulation per (topology, destination)
 * pair from two plain-text input files and validates each descriptor before
 * anything reaches the store.
 *
 * Topologies file: one `name|stubsFile` per line (stubs part optional).
 * Destinations file: one integer node id per line.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { parseInput, simulationDescriptorSchema } from './validation';
import type { SimulationDescriptor } from '@shared/types/simulation';

export interface Topology {
  name: string;
  stubs: string;
}

export interface GenerateParams {
  topologies: readonly Topology[];
  destinations: readonly number[];
  repetitions: number;
  minDelay: number;
  maxDelay: number;
  threshold: number;
  reportNodes: boolean;
  /** Defaults to uuid v4 */
  newId?: () => string;
}

function nonEmptyLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function parseTopologies(content: string): Topology[] {
  return nonEmptyLines(content).map((line) => {
    const [name, stubs = ''] = line.split('|').map((part) => part.trim());
    return { name, stubs };
  });
}

export function parseDestinations(content: string): number[] {
  return nonEmptyLines(content).map((line, i) => {
    if (!/^\d+$/.test(line)) {
      throw new Error(`Invalid destination on line ${i + 1}: "${line}"`);
    }
    return Number(line);
  });
}

export async function readTopologies(file: string): Promise<Topology[]> {
  return parseTopologies(await fs.readFile(file, 'utf-8'));
}

export async function readDestinations(file: string): Promise<number[]> {
  return parseDestinations(await fs.readFile(file, 'utf-8'));
}

/**
 * Names of topologies whose file does not exist, resolved against baseDir.
 */
export async function findMissingTopologies(
  topologies: readonly Topology[],
  baseDir: string = process.cwd()
): Promise<string[]> {
  const missing: string[] = [];
  for (const topology of topologies) {
    try {
      await fs.access(path.resolve(baseDir, topology.name));
    } catch {
      missing.push(topology.name);
    }
  }
  return missing;
}

/**
 * Generate a simulation for each topology and each destination.
 * Seeds are left null, so every generated run is non-deterministic.
 * Throws on the first descriptor that fails validation.
 */
export function generateSimulations(params: GenerateParams): SimulationDescriptor[] {
  const newId = params.newId ?? uuidv4;
  const simulations: SimulationDescriptor[] = [];
  for (const topology of params.topologies) {
    for (const destination of params.destinations) {
      const parsed = parseInput(simulationDescriptorSchema, {
        id: newId(),
        topology: topology.name,
        destination,
        repetitions: params.repetitions,
        minDelay: params.minDelay,
        maxDelay: params.maxDelay,
        threshold: params.threshold,
        stubsFile: topology.stubs,
        seed: null,
        reportNodes: params.reportNodes,
      });
      if (!parsed.success) {
        throw new Error(`Invalid simulation for ${topology.name} → ${destination}: ${parsed.error}`);
      }
      simulations.push(parsed.data);
    }
  }
  return simulations;
}
