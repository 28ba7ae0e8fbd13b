/**
 * @arch shiftmap.core.domain
 *
 * Complexity classification of an impact report.
 */
import type { ComplexityInput, MigrationComplexity } from './types.js';

export const COMPLEXITY_LABELS: Record<MigrationComplexity, string> = {
  simple: 'Simple',
  medium: 'Medium',
  complex: 'Complex',
  very_complex: 'Very Complex',
};

/** Affected files and affected types: ≤1, ≤5, ≤20, more. */
function countScore(count: number): number {
  if (count <= 1) return 0;
  if (count <= 5) return 1;
  if (count <= 20) return 2;
  return 3;
}

function projectReferenceScore(count: number): number {
  if (count === 0) return 0;
  if (count <= 2) return 1;
  return 2;
}

function projectCountScore(count: number): number {
  if (count <= 1) return 0;
  if (count <= 3) return 1;
  return 2;
}

/**
 * Any error makes an operation very_complex; otherwise the bucketed
 * dimensions are summed and the total mapped to a level.
 */
export function calculateComplexity(input: ComplexityInput): MigrationComplexity {
  if (input.hasErrors) return 'very_complex';

  const score = countScore(input.affectedFileCount)
    + countScore(input.affectedTypeCount)
    + projectReferenceScore(input.requiredProjectReferenceCount)
    + projectCountScore(input.affectedProjectCount);

  if (score <= 1) return 'simple';
  if (score <= 4) return 'medium';
  if (score <= 7) return 'complex';
  return 'very_complex';
}
