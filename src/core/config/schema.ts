/**
 * @arch shiftmap.core.domain.schema
 */
import { z } from 'zod';
import { DEFAULT_CONCURRENCY, DEFAULT_EXCLUDE_PATTERNS } from '../builder/options.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Graph build settings. */
export const GraphSettingsSchema = z.object({
  /** Discover type_usage edges (slow on large codebases) */
  analyze_type_usages: z.boolean().default(true),
  analyze_using_directives: z.boolean().default(true),
  include_private_types: z.boolean().default(false),
  /** Keep *.g.cs, *.generated.cs and *.Designer.* files */
  include_generated_files: z.boolean().default(false),
  exclude_patterns: z.array(z.string()).default([...DEFAULT_EXCLUDE_PATTERNS]),
  max_type_usage_depth: z.number().int().min(1).default(3),
  parallel: z.boolean().default(true),
  /** Projects processed at once */
  concurrency: z.number().int().min(1).max(64).default(DEFAULT_CONCURRENCY),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Main configuration schema (.shiftmap/config.yaml). */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  graph: withDefaults(GraphSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type GraphSettings = z.infer<typeof GraphSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
