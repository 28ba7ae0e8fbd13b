/**
 * @arch shiftmap.test.unit
 */
import { describe, it, expect } from 'vitest';
import { calculateComplexity, COMPLEXITY_LABELS } from '../../../../src/core/impact/complexity.js';
import type { ComplexityInput, MigrationComplexity } from '../../../../src/core/impact/types.js';

function input(overrides: Partial<ComplexityInput> = {}): ComplexityInput {
  return {
    affectedFileCount: 1,
    affectedTypeCount: 1,
    requiredProjectReferenceCount: 0,
    affectedProjectCount: 1,
    hasErrors: false,
    ...overrides,
  };
}

const ORDER: MigrationComplexity[] = ['simple', 'medium', 'complex', 'very_complex'];

describe('calculateComplexity', () => {
  it('should rate a single-file change as simple', () => {
    expect(calculateComplexity(input())).toBe('simple');
  });

  it('should rate any error as very complex', () => {
    expect(calculateComplexity(input({ hasErrors: true }))).toBe('very_complex');
  });

  it('should sum the bucketed dimensions', () => {
    // files 1 + types 1 = 2
    expect(calculateComplexity(input({ affectedFileCount: 3, affectedTypeCount: 2 }))).toBe('medium');
    // files 2 + types 2 + refs 1 + projects 1 = 6
    expect(calculateComplexity(input({
      affectedFileCount: 12,
      affectedTypeCount: 8,
      requiredProjectReferenceCount: 1,
      affectedProjectCount: 2,
    }))).toBe('complex');
    // 3 + 3 + 2 + 2 = 10
    expect(calculateComplexity(input({
      affectedFileCount: 40,
      affectedTypeCount: 30,
      requiredProjectReferenceCount: 3,
      affectedProjectCount: 5,
    }))).toBe('very_complex');
  });

  it('should place bucket boundaries on the upper bound', () => {
    // files 1 only = 1
    expect(calculateComplexity(input({ affectedFileCount: 5 }))).toBe('simple');
    // files 2 + types 2 = 4
    expect(calculateComplexity(input({ affectedFileCount: 20, affectedTypeCount: 20 }))).toBe('medium');
    // files 3 + types 2 = 5
    expect(calculateComplexity(input({ affectedFileCount: 21, affectedTypeCount: 20 }))).toBe('complex');
  });

  it('should never decrease as affected files grow', () => {
    const levels = [0, 1, 2, 5, 6, 20, 21, 100].map((count) =>
      ORDER.indexOf(calculateComplexity(input({
        affectedFileCount: count,
        affectedTypeCount: 4,
        requiredProjectReferenceCount: 1,
      })))
    );

    for (let i = 1; i < levels.length; i++) {
      expect(levels[i]).toBeGreaterThanOrEqual(levels[i - 1] ?? 0);
    }
  });

  it('should label every level', () => {
    expect(ORDER.map((level) => COMPLEXITY_LABELS[level])).toEqual(['Simple', 'Medium', 'Complex', 'Very Complex']);
  });
});
