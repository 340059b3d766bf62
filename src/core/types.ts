import { z } from 'zod';

// ===== Configuration =====

export const ContainerConfigSchema = z.object({
  storage: z.object({
    driver: z.enum(['memory', 'sqlite']).default('sqlite'),
    /** SQLite database file; relative paths resolve against the project directory */
    path: z.string().default('.adaptive-container/data.db'),
  }).default({}),
  prediction: z.object({
    recentWindow: z.number().int().min(1).max(1000).default(10),
    subscriberCapacity: z.number().int().min(1).max(10_000).default(32),
  }).default({}),
  engine: z.object({
    /** Transitions that must be seen before a successor is suggested */
    minObservations: z.number().int().min(1).default(1),
  }).default({}),
  /** Instruction DSL lines, e.g. "ignore noise" */
  instructions: z.array(z.string()).default([]),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;
