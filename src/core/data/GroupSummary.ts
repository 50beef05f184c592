/**
 * Group Summary Model
 *
 * Both tests reduce each arm to the same triple: how many observations,
 * the point estimate, and the variance of that estimate. Everything
 * downstream (intervals, sample size) works on this triple only.
 */

import jStat from 'jstat';
import { ValidationError } from '../errors';

export type SummaryKind = 'proportion' | 'mean';

export interface GroupSummary {
  readonly kind: SummaryKind;

  /** Number of observations in the arm */
  readonly count: number;

  /** Observed proportion or sample mean */
  readonly estimate: number;

  /** Variance of the estimator: p(1-p)/n or s²/n */
  readonly variance: number;

  /** Per-observation variance: p(1-p) or s² */
  readonly observationVariance: number;

  /** Sum of the observations (successes for proportions) */
  readonly total: number;
}

/**
 * Summary statistics of a sample, before they are turned into a GroupSummary
 */
export interface SampleStatistics {
  n: number;
  sum: number;
  mean: number;
  /** Unbiased (n - 1 denominator) sample variance */
  variance: number;
}

/**
 * Reduce a sample to its count, sum, mean and unbiased variance
 */
export function computeSampleStatistics(values: readonly number[]): SampleStatistics {
  const n = values.length;
  if (n < 2) {
    throw new ValidationError('Cannot compute a sample variance from fewer than 2 observations', {
      n,
    });
  }

  return {
    n,
    sum: jStat.sum(values),
    mean: jStat.mean(values),
    variance: jStat.variance(values, true),
  };
}

/**
 * Factory functions for creating GroupSummary values
 */
export class GroupSummaryFactory {
  /**
   * Bernoulli arm with the unpooled variance p(1-p)/n
   */
  static fromProportion(successes: number, n: number): GroupSummary {
    if (!Number.isInteger(n) || n < 1 || !Number.isInteger(successes) || successes < 0 || successes > n) {
      throw new ValidationError('Proportion summary needs integer counts with 0 ≤ successes ≤ n and n ≥ 1', {
        successes,
        n,
      });
    }

    const estimate = successes / n;
    const observationVariance = estimate * (1 - estimate);

    return Object.freeze({
      kind: 'proportion' as const,
      count: n,
      estimate,
      variance: observationVariance / n,
      observationVariance,
      total: successes,
    });
  }

  /**
   * Continuous arm with the variance of the sample mean s²/n
   */
  static fromObservations(values: readonly number[]): GroupSummary {
    return this.fromSampleStatistics(computeSampleStatistics(values));
  }

  static fromSampleStatistics(stats: SampleStatistics): GroupSummary {
    return Object.freeze({
      kind: 'mean' as const,
      count: stats.n,
      estimate: stats.mean,
      variance: stats.variance / stats.n,
      observationVariance: stats.variance,
      total: stats.sum,
    });
  }
}
