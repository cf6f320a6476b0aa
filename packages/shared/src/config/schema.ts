import { z } from 'zod';

export const SandboxConfigSchema = z.object({
  /** Docker CLI binary */
  dockerPath: z.string().default('docker'),
  platform: z.string().default('linux/x86_64'),
  buildTimeoutMs: z.number().int().positive().default(30 * 60_000),
  runTimeoutMs: z.number().int().positive().default(30 * 60_000),
  /** Keep built images after an instance finishes (speeds up re-validation) */
  keepImages: z.boolean().default(false),
  maxOutputBytes: z
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
  /** Checkout location inside the image */
  workdir: z.string().default('/testbed'),
  /** Environment variables passed as build args when set, e.g. GITHUB_TOKEN */
  buildArgEnv: z.array(z.string()).default(['GITHUB_TOKEN']),
});

export const MinimalFixConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Number of random non-gold edits per FAIL2PASS validation */
  mutations: z.number().int().min(0).default(3),
  seed: z.number().int().default(1),
});

export const MemoryPoolConfigSchema = z.object({
  enabled: z.boolean().default(true),
  backend: z.enum(['memory', 'sqlite']).default('memory'),
  path: z.string().default('./output/memory.sqlite'),
  /** Seed the pool from accepted records already in the result store */
  seedFromResults: z.boolean().default(true),
});

export const CommandGeneratorConfigSchema = z.object({
  /** Executable and leading args; the stage name is appended as the last argument */
  command: z.array(z.string()).default([]),
  timeoutMs: z.number().int().positive().default(30 * 60_000),
  /** Extra environment variables forwarded to the generator process */
  envAllowlist: z.array(z.string()).default([]),
  cwd: z.string().optional(),
});

export const GeneratorsConfigSchema = z
  .object({
    backend: z.enum(['command', 'static']).default('static'),
    command: CommandGeneratorConfigSchema.default({}),
    static: z
      .object({
        dir: z.string().default('./artifacts'),
      })
      .default({}),
  })
  .refine((data) => data.backend !== 'command' || data.command.command.length > 0, {
    message: 'generators.command.command must name an executable when backend is "command"',
    path: ['command', 'command'],
  });

export const ConfigSchema = z.object({
  workers: z.number().int().min(1).default(4),
  roundLimit: z.number().int().min(1).default(5),
  outputDir: z.string().default('./output'),
  /** Per-round working copies of artifacts and logs */
  setupDir: z.string().default('./output/setup'),
  resultsPath: z.string().default('./output/results.jsonl'),
  forceRefresh: z.boolean().default(false),
  resume: z
    .object({
      retryFailed: z.boolean().default(true),
    })
    .default({}),
  testGeneration: z
    .object({
      /** A pre-existing test patch touching fewer files than this is regenerated */
      minTestFiles: z.number().int().min(0).default(3),
    })
    .default({}),
  sandbox: SandboxConfigSchema.default({}),
  minimalFix: MinimalFixConfigSchema.default({}),
  memoryPool: MemoryPoolConfigSchema.default({}),
  generators: GeneratorsConfigSchema.default({}),
  feedback: z
    .object({
      excerptLines: z.number().int().positive().default(600),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type MinimalFixConfig = z.infer<typeof MinimalFixConfigSchema>;
export type MemoryPoolConfig = z.infer<typeof MemoryPoolConfigSchema>;
export type GeneratorsConfig = z.infer<typeof GeneratorsConfigSchema>;
