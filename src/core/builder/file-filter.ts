/**
 * @arch shiftmap.core.domain
 *
 * Decides which project files enter the graph.
 */
import { createPathMatcher } from '../../utils/path-matcher.js';
import { GENERATED_FILE_PATTERNS } from './options.js';
import type { GraphBuildOptions } from './types.js';

export type FileFilterDecision = 'include' | 'excluded' | 'generated';

export interface FileFilter {
  check(filePath: string): FileFilterDecision;
}

export function createFileFilter(
  options: Pick<GraphBuildOptions, 'excludePatterns' | 'includeGeneratedFiles'>
): FileFilter {
  const excludeMatcher = createPathMatcher(options.excludePatterns);
  const generatedMatcher = createPathMatcher(GENERATED_FILE_PATTERNS);

  return {
    check(filePath: string): FileFilterDecision {
      if (excludeMatcher.matches(filePath)) return 'excluded';
      if (!options.includeGeneratedFiles && generatedMatcher.matchesFileName(filePath)) {
        return 'generated';
      }
      return 'include';
    },
  };
}
