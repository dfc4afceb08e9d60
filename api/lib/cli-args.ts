import { generatorOptionsSchema, parseInput, type GeneratorOptions } from './validation';

export const GENERATE_USAGE = `Usage:
  generate-simulations <topologies> <destinations> <priority> [--reportnodes] [--c=<repetitions>]
                       [--min=<min_delay>] [--max=<max_delay>] [--th=<threshold>] [--db=<db_path>]

Options:
  --c=<repetitions>  Number of repetitions [default: 100].
  --min=<min_delay>  Minimum message delay [default: 10].
  --max=<max_delay>  Maximum message delay [default: 1000].
  --th=<threshold>   Threshold value [default: 2000000].
  --db=<db_path>     Path to the DB file [default: $SIMULATIONS_DB_PATH or data/simulations.db].
  --reportnodes      Enable report nodes data individually.`;

const VALUE_FLAGS: Record<string, keyof GeneratorOptions> = {
  '--c': 'repetitions',
  '--min': 'minDelay',
  '--max': 'maxDelay',
  '--th': 'threshold',
  '--db': 'dbPath',
};

export interface GeneratorDefaults {
  /** Database file used when --db is absent; the worker's configured path. */
  dbPath: string;
}

/**
 * Parse generate-simulations arguments (without the node/script prefix).
 */
export function parseGeneratorArgs(argv: readonly string[], defaults: GeneratorDefaults):
  { success: true; data: GeneratorOptions } | { success: false; error: string } {
  const positional: string[] = [];
  const raw: Record<string, unknown> = { dbPath: defaults.dbPath };

  for (const arg of argv) {
    if (arg === '--reportnodes') {
      raw.reportNodes = true;
      continue;
    }
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      const key = VALUE_FLAGS[flag];
      if (key === undefined || eq === -1) {
        return { success: false, error: `Unknown option: ${arg}` };
      }
      raw[key] = arg.slice(eq + 1);
      continue;
    }
    positional.push(arg);
  }

  if (positional.length !== 3) {
    return { success: false, error: 'Expected <topologies> <destinations> <priority>' };
  }
  const [topologiesFile, destinationsFile, priority] = positional;
  return parseInput(generatorOptionsSchema, { ...raw, topologiesFile, destinationsFile, priority });
}
