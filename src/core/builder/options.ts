/**
 * @arch shiftmap.core.domain
 *
 * Build option presets.
 */
import type { GraphBuildOptions } from './types.js';

/** Build-output and IDE folders. */
export const DEFAULT_EXCLUDE_PATTERNS = ['**/bin/**', '**/obj/**', '**/.vs/**'];

/** File names produced by code generators. */
export const GENERATED_FILE_PATTERNS = ['*.g.cs', '*.generated.cs', '*.Designer.*'];

export const DEFAULT_CONCURRENCY = 4;

export function defaultBuildOptions(): GraphBuildOptions {
  return {
    analyzeTypeUsages: true,
    analyzeUsingDirectives: true,
    includePrivateTypes: false,
    includeGeneratedFiles: false,
    excludePatterns: [...DEFAULT_EXCLUDE_PATTERNS],
    maxTypeUsageDepth: 3,
    parallel: true,
    concurrency: DEFAULT_CONCURRENCY,
  };
}

/**
 * Structure only: no usage discovery, no using directives.
 */
export function fastBuildOptions(): GraphBuildOptions {
  return {
    ...defaultBuildOptions(),
    analyzeTypeUsages: false,
    analyzeUsingDirectives: false,
  };
}

/**
 * Everything, including private types and generated files.
 */
export function fullBuildOptions(): GraphBuildOptions {
  return {
    ...defaultBuildOptions(),
    includePrivateTypes: true,
    includeGeneratedFiles: true,
    maxTypeUsageDepth: 5,
  };
}

/**
 * Fill unset options from the defaults.
 */
export function resolveBuildOptions(options: Partial<GraphBuildOptions> = {}): GraphBuildOptions {
  const defaults = defaultBuildOptions();
  return {
    analyzeTypeUsages: options.analyzeTypeUsages ?? defaults.analyzeTypeUsages,
    analyzeUsingDirectives: options.analyzeUsingDirectives ?? defaults.analyzeUsingDirectives,
    includePrivateTypes: options.includePrivateTypes ?? defaults.includePrivateTypes,
    includeGeneratedFiles: options.includeGeneratedFiles ?? defaults.includeGeneratedFiles,
    excludePatterns: options.excludePatterns ?? defaults.excludePatterns,
    maxTypeUsageDepth: options.maxTypeUsageDepth ?? defaults.maxTypeUsageDepth,
    parallel: options.parallel ?? defaults.parallel,
    concurrency: Math.max(1, options.concurrency ?? defaults.concurrency),
  };
}
