/**
 * @arch shiftmap.util
 *
 * Glob matcher for exclude patterns and generated-file name conventions.
 */
import { minimatch } from 'minimatch';
import { getFileName, normalizePath } from './paths.js';

/**
 * Matcher over a fixed set of glob patterns.
 */
export interface PathMatcher {
  /**
   * True when the path matches at least one pattern.
   * Paths and patterns are both matched without their root, so "**\/bin/**"
   * and "C:/repo/src/bin/**" both match "C:/repo/src/bin/a.cs".
   */
  matches(filePath: string): boolean;

  /**
   * True when the file name alone matches at least one pattern.
   */
  matchesFileName(filePath: string): boolean;

  /**
   * Get the patterns this matcher was built with.
   */
  patterns(): string[];
}

const MATCH_OPTIONS = { dot: true, nocase: true } as const;

/**
 * Strip drive letters and leading slashes so globs written relative to
 * any root apply to absolute paths too.
 */
export function toMatchablePath(filePath: string): string {
  return normalizePath(filePath)
    .replace(/^[A-Za-z]:/, '')
    .replace(/^\/+/, '');
}

/**
 * Create a PathMatcher for the given glob patterns.
 */
export function createPathMatcher(patterns: string[] = []): PathMatcher {
  const normalizedPatterns = patterns.map(toMatchablePath);

  return {
    matches(filePath: string): boolean {
      const candidate = toMatchablePath(filePath);
      return normalizedPatterns.some((pattern) => minimatch(candidate, pattern, MATCH_OPTIONS));
    },

    matchesFileName(filePath: string): boolean {
      const name = getFileName(filePath);
      return normalizedPatterns.some((pattern) => minimatch(name, pattern, MATCH_OPTIONS));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}
