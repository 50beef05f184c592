/**
 * Normal distribution and the standard-normal kernel
 *
 * Evaluation is delegated to jStat, whose CDF is built on a high-precision
 * erfc and whose quantile refines the inverse erfc with Halley steps.
 */

import jStat from 'jstat';
import { Distribution } from './Distribution';
import { DomainError, ValidationError } from '../errors';

export class NormalDistribution implements Distribution {
  constructor(
    private readonly meanValue: number,
    private readonly stdDevValue: number
  ) {
    if (!Number.isFinite(meanValue) || !(stdDevValue > 0) || !Number.isFinite(stdDevValue)) {
      throw new ValidationError(
        `Invalid Normal parameters: mean=${meanValue}, stdDev=${stdDevValue}. Standard deviation must be positive.`,
        { mean: meanValue, stdDev: stdDevValue }
      );
    }
  }

  /**
   * Probability density function
   */
  pdf(x: number): number {
    return jStat.normal.pdf(x, this.meanValue, this.stdDevValue);
  }

  /**
   * Cumulative distribution function
   */
  cdf(x: number): number {
    if (x === Infinity) return 1;
    if (x === -Infinity) return 0;
    return jStat.normal.cdf(x, this.meanValue, this.stdDevValue);
  }

  /**
   * Inverse CDF (quantile function), defined on the open interval (0, 1)
   */
  quantile(p: number): number {
    if (!(p > 0 && p < 1)) {
      throw new DomainError(`Normal quantile is only defined for p in (0, 1), got ${p}`, { p });
    }
    if (p === 0.5) return this.meanValue;

    return jStat.normal.inv(p, this.meanValue, this.stdDevValue);
  }

  mean(): number {
    return this.meanValue;
  }

  /**
   * Variance of the Normal distribution: σ²
   */
  variance(): number {
    return this.stdDevValue * this.stdDevValue;
  }

  support(): { min: number; max: number } {
    return { min: -Infinity, max: Infinity };
  }

  stdDev(): number {
    return this.stdDevValue;
  }

  getParameters(): { mean: number; stdDev: number } {
    return { mean: this.meanValue, stdDev: this.stdDevValue };
  }
}

const STANDARD_NORMAL = new NormalDistribution(0, 1);

/**
 * Φ(x)
 */
export function standardNormalCdf(x: number): number {
  return STANDARD_NORMAL.cdf(x);
}

/**
 * Φ⁻¹(p); throws DomainError unless 0 < p < 1
 */
export function standardNormalQuantile(p: number): number {
  return STANDARD_NORMAL.quantile(p);
}

/**
 * Two-sided critical value z_{1-α/2}, taken from the lower tail so that
 * very small α does not round 1 - α/2 up to 1
 */
export function twoSidedCriticalValue(alpha: number): number {
  return -standardNormalQuantile(alpha / 2);
}

/**
 * z_{power}, the quantile matching the target power 1-β
 */
export function powerQuantile(power: number): number {
  return standardNormalQuantile(power);
}

/**
 * Two-sided p-value of a standard-normal statistic, 2·Φ(-|z|)
 */
export function twoSidedNormalPValue(statistic: number): number {
  if (Number.isNaN(statistic)) return NaN;
  if (statistic === 0) return 1;
  return Math.min(1, 2 * standardNormalCdf(-Math.abs(statistic)));
}
