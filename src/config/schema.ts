import { z } from "zod";

export const generatorConfigSchema = z.object({
  /** Executable that receives the prompt on stdin and prints the response. */
  command: z.string().min(1).default("claude"),
  args: z.array(z.string()).default(["-p", "-"]),
  timeoutMs: z.number().int().positive().default(300_000),
});

export const stubsmithConfigSchema = z.object({
  /** Where generated files are written, relative to the project directory. */
  outputDir: z.string().default("."),
  /** Checkpoint, archive and run reports, relative to the project directory. */
  stateDir: z.string().default(".stubsmith"),
  maxAttempts: z.number().int().positive().default(3),
  maxAdapterRetries: z.number().int().nonnegative().default(3),
  backoffBaseMs: z.number().int().nonnegative().default(500),
  backoffMaxMs: z.number().int().nonnegative().default(8_000),
  concurrency: z.number().int().positive().default(1),
  /** Keep completed checkpoints under <stateDir>/archive instead of deleting them. */
  archiveCheckpoints: z.boolean().default(true),
  generator: generatorConfigSchema.default({}),
});

export type StubsmithConfigInput = z.input<typeof stubsmithConfigSchema>;
