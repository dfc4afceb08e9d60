import { z } from 'zod';

// ---------------------------------------------------------------------------
// Simulation descriptor
// ---------------------------------------------------------------------------

export const simulationDescriptorSchema = z
  .object({
    id: z.string().min(1),
    topology: z.string().min(1),
    destination: z.number().int().min(0),
    repetitions: z.number().int().positive(),
    minDelay: z.number().int().min(0),
    maxDelay: z.number().int().min(0),
    threshold: z.number().int().positive(),
    stubsFile: z.string(),
    seed: z.number().int().nullable(),
    reportNodes: z.boolean().nullable(),
  })
  .refine((s) => s.minDelay <= s.maxDelay, {
    message: 'minDelay must not exceed maxDelay',
    path: ['minDelay'],
  });

export type SimulationDescriptorInput = z.infer<typeof simulationDescriptorSchema>;

// ---------------------------------------------------------------------------
// Generator options (CLI)
// ---------------------------------------------------------------------------

export const generatorOptionsSchema = z
  .object({
    topologiesFile: z.string().min(1),
    destinationsFile: z.string().min(1),
    priority: z.coerce.number().int(),
    repetitions: z.coerce.number().int().positive().default(100),
    minDelay: z.coerce.number().int().min(0).default(10),
    maxDelay: z.coerce.number().int().min(0).default(1000),
    threshold: z.coerce.number().int().positive().default(2_000_000),
    reportNodes: z.boolean().default(false),
    dbPath: z.string().min(1),
  })
  .refine((o) => o.minDelay <= o.maxDelay, {
    message: 'min delay must not exceed max delay',
    path: ['minDelay'],
  });

export type GeneratorOptions = z.infer<typeof generatorOptionsSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse and validate input against a zod schema.
 * Returns { success: true, data } on valid input, { success: false, error } on invalid.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown):
  { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const messages = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).filter(Boolean);
  return { success: false, error: messages.join('; ') || 'Invalid input' };
}
