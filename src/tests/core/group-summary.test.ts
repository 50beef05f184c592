import { describe, it, expect } from 'vitest';
import { GroupSummaryFactory, computeSampleStatistics } from '../../core/data';
import { ValidationError } from '../../core/errors';

describe('GroupSummaryFactory', () => {
  describe('fromProportion', () => {
    it('should use the unpooled Bernoulli variance', () => {
      const summary = GroupSummaryFactory.fromProportion(25, 100);

      expect(summary.kind).toBe('proportion');
      expect(summary.count).toBe(100);
      expect(summary.estimate).toBe(0.25);
      expect(summary.observationVariance).toBe(0.1875);
      expect(summary.variance).toBe(0.001875);
      expect(summary.total).toBe(25);
    });

    it('should allow zero and full success', () => {
      expect(GroupSummaryFactory.fromProportion(0, 10).variance).toBe(0);
      expect(GroupSummaryFactory.fromProportion(10, 10).variance).toBe(0);
    });

    it('should be immutable', () => {
      const summary = GroupSummaryFactory.fromProportion(1, 4);
      expect(Object.isFrozen(summary)).toBe(true);
    });

    it('should reject inconsistent counts', () => {
      expect(() => GroupSummaryFactory.fromProportion(5, 0)).toThrow(ValidationError);
      expect(() => GroupSummaryFactory.fromProportion(11, 10)).toThrow(ValidationError);
      expect(() => GroupSummaryFactory.fromProportion(-1, 10)).toThrow(ValidationError);
      expect(() => GroupSummaryFactory.fromProportion(1.5, 10)).toThrow(ValidationError);
    });
  });

  describe('fromObservations', () => {
    it('should use the variance of the sample mean', () => {
      const summary = GroupSummaryFactory.fromObservations([2, 4, 4, 4, 5, 5, 7, 9]);

      // sum 40, mean 5, squared deviations 32, s² = 32 / 7
      expect(summary.kind).toBe('mean');
      expect(summary.count).toBe(8);
      expect(summary.estimate).toBe(5);
      expect(summary.total).toBe(40);
      expect(summary.observationVariance).toBeCloseTo(32 / 7, 12);
      expect(summary.variance).toBeCloseTo(32 / 7 / 8, 12);
    });

    it('should need at least two observations', () => {
      expect(() => GroupSummaryFactory.fromObservations([3])).toThrow(ValidationError);
      expect(() => GroupSummaryFactory.fromObservations([])).toThrow(ValidationError);
    });
  });
});

describe('computeSampleStatistics', () => {
  it('should use the n - 1 denominator', () => {
    const stats = computeSampleStatistics([1, 2, 3, 4]);
    expect(stats).toEqual({ n: 4, sum: 10, mean: 2.5, variance: 5 / 3 });
  });

  it('should report zero variance for a constant sample', () => {
    expect(computeSampleStatistics([7, 7, 7]).variance).toBe(0);
  });
});
