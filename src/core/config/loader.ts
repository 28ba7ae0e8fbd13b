/**
 * @arch shiftmap.core.domain
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type GraphSettings, type LoggingSettings } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import type { GraphBuildOptions } from '../builder/types.js';

const DEFAULT_CONFIG_PATH = '.shiftmap/config.yaml';

/**
 * Partial configuration; unset fields take schema defaults.
 */
export interface ConfigOverrides {
  version?: string;
  graph?: Partial<GraphSettings>;
  logging?: Partial<LoggingSettings>;
}

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  const exists = await fileExists(fullPath);

  if (!exists) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema, ErrorCodes.INVALID_CONFIG);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: ConfigOverrides): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Map graph settings onto builder options.
 */
export function toBuildOptions(config: Config): GraphBuildOptions {
  const { graph } = config;
  return {
    analyzeTypeUsages: graph.analyze_type_usages,
    analyzeUsingDirectives: graph.analyze_using_directives,
    includePrivateTypes: graph.include_private_types,
    includeGeneratedFiles: graph.include_generated_files,
    excludePatterns: [...graph.exclude_patterns],
    maxTypeUsageDepth: graph.max_type_usage_depth,
    parallel: graph.parallel,
    concurrency: graph.concurrency,
  };
}

/**
 * Apply the configured log level. Child loggers follow it.
 */
export function applyLoggingConfig(config: Config, target: Logger = logger): void {
  target.setLevel(config.logging.level);
}
