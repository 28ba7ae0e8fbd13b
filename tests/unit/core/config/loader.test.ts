/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  applyLoggingConfig,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
  toBuildOptions,
} from '../../../../src/core/config/loader.js';
import { defaultBuildOptions } from '../../../../src/core/builder/options.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `shiftmap-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.shiftmap'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should match the default build options', () => {
      expect(toBuildOptions(getDefaultConfig())).toEqual(defaultBuildOptions());
    });

    it('should log at info level by default', () => {
      expect(getDefaultConfig().logging.level).toBe('info');
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load settings and fill the rest from defaults', async () => {
      await writeFile(join(testDir, '.shiftmap', 'config.yaml'), [
        'graph:',
        '  analyze_type_usages: false',
        '  exclude_patterns:',
        '    - "**/Migrations/**"',
        '  concurrency: 8',
        'logging:',
        '  level: debug',
        '',
      ].join('\n'));

      const config = await loadConfig(testDir);

      expect(config.graph.analyze_type_usages).toBe(false);
      expect(config.graph.exclude_patterns).toEqual(['**/Migrations/**']);
      expect(config.graph.concurrency).toBe(8);
      expect(config.graph.max_type_usage_depth).toBe(3);
      expect(config.logging.level).toBe('debug');
    });

    it('should load from a custom path', async () => {
      await writeFile(join(testDir, 'shiftmap.yaml'), 'graph:\n  parallel: false\n');

      const config = await loadConfig(testDir, 'shiftmap.yaml');

      expect(config.graph.parallel).toBe(false);
    });

    it('should wrap validation failures in a ConfigError', async () => {
      const configPath = join(testDir, '.shiftmap', 'config.yaml');
      await writeFile(configPath, 'graph:\n  concurrency: 0\n');

      const attempt = loadConfig(testDir);

      await expect(attempt).rejects.toBeInstanceOf(ConfigError);
      await expect(attempt).rejects.toMatchObject({
        code: ErrorCodes.CONFIG_LOAD_ERROR,
        message: expect.stringMatching(/^Failed to load config from .*config\.yaml: YAML validation failed: graph\.concurrency: /),
      });
    });

    it('should wrap YAML syntax errors in a ConfigError', async () => {
      await writeFile(join(testDir, '.shiftmap', 'config.yaml'), 'graph: [unclosed\n');

      await expect(loadConfig(testDir)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    });
  });

  describe('mergeConfig', () => {
    it('should fill unset sections and fields', () => {
      const config = mergeConfig({ graph: { include_private_types: true } });

      expect(config.graph.include_private_types).toBe(true);
      expect(config.graph.analyze_using_directives).toBe(true);
      expect(config.logging.level).toBe('info');
    });
  });

  describe('getConfigPath', () => {
    it('should point into the .shiftmap directory', () => {
      expect(getConfigPath('/repo')).toBe(join('/repo', '.shiftmap', 'config.yaml'));
    });
  });

  describe('toBuildOptions', () => {
    it('should map every graph setting', () => {
      const config = mergeConfig({
        graph: {
          analyze_type_usages: false,
          analyze_using_directives: false,
          include_private_types: true,
          include_generated_files: true,
          exclude_patterns: ['**/gen/**'],
          max_type_usage_depth: 2,
          parallel: false,
          concurrency: 2,
        },
      });

      expect(toBuildOptions(config)).toEqual({
        analyzeTypeUsages: false,
        analyzeUsingDirectives: false,
        includePrivateTypes: true,
        includeGeneratedFiles: true,
        excludePatterns: ['**/gen/**'],
        maxTypeUsageDepth: 2,
        parallel: false,
        concurrency: 2,
      });
    });
  });

  describe('applyLoggingConfig', () => {
    it('should set the level of the given logger', () => {
      const log = new Logger();

      applyLoggingConfig(mergeConfig({ logging: { level: 'warn' } }), log);

      expect(log.getLevel()).toBe('warn');
    });
  });
});
