/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EXCLUDE_PATTERNS,
  defaultBuildOptions,
  fastBuildOptions,
  fullBuildOptions,
  resolveBuildOptions,
} from '../../../../src/core/builder/options.js';

describe('build option presets', () => {
  it('should analyze usages and usings by default', () => {
    expect(defaultBuildOptions()).toEqual({
      analyzeTypeUsages: true,
      analyzeUsingDirectives: true,
      includePrivateTypes: false,
      includeGeneratedFiles: false,
      excludePatterns: ['**/bin/**', '**/obj/**', '**/.vs/**'],
      maxTypeUsageDepth: 3,
      parallel: true,
      concurrency: 4,
    });
  });

  it('should skip both analyses in the fast preset', () => {
    const fast = fastBuildOptions();

    expect(fast.analyzeTypeUsages).toBe(false);
    expect(fast.analyzeUsingDirectives).toBe(false);
  });

  it('should include everything in the full preset', () => {
    const full = fullBuildOptions();

    expect(full.includePrivateTypes).toBe(true);
    expect(full.includeGeneratedFiles).toBe(true);
    expect(full.maxTypeUsageDepth).toBe(5);
  });

  it('should not share the default pattern array', () => {
    defaultBuildOptions().excludePatterns.push('**/tmp/**');

    expect(DEFAULT_EXCLUDE_PATTERNS).toHaveLength(3);
  });
});

describe('resolveBuildOptions', () => {
  it('should fill unset options', () => {
    const resolved = resolveBuildOptions({ parallel: false, excludePatterns: [] });

    expect(resolved.parallel).toBe(false);
    expect(resolved.excludePatterns).toEqual([]);
    expect(resolved.maxTypeUsageDepth).toBe(3);
  });

  it('should clamp concurrency to at least one', () => {
    expect(resolveBuildOptions({ concurrency: 0 }).concurrency).toBe(1);
  });
});
