/**
 * Student-t distribution with real-valued degrees of freedom
 *
 * CDF and PDF come from jStat (regularized incomplete beta). The quantile is
 * solved here so that the iteration count is bounded and reported.
 */

import jStat from 'jstat';
import { Distribution } from './Distribution';
import { standardNormalQuantile } from './NormalDistribution';
import { ConvergenceError, DomainError, ValidationError } from '../errors';

/** Upper bound on Newton/bisection steps in the quantile solver */
export const MAX_QUANTILE_ITERATIONS = 100;

/** Upper bound on bracket doublings before root refinement starts */
const MAX_BRACKET_EXPANSIONS = 64;

const RELATIVE_TOLERANCE = 1e-12;

export class StudentTDistribution implements Distribution {
  constructor(private readonly degreesOfFreedom: number) {
    if (!(degreesOfFreedom > 0) || !Number.isFinite(degreesOfFreedom)) {
      throw new ValidationError(
        `Invalid Student-t parameters: df=${degreesOfFreedom}. Degrees of freedom must be positive and finite.`,
        { df: degreesOfFreedom }
      );
    }
  }

  pdf(x: number): number {
    return jStat.studentt.pdf(x, this.degreesOfFreedom);
  }

  cdf(x: number): number {
    if (x === Infinity) return 1;
    if (x === -Infinity) return 0;
    if (x === 0) return 0.5;
    return jStat.studentt.cdf(x, this.degreesOfFreedom);
  }

  /**
   * Inverse CDF on (0, 1).
   *
   * Solved on the smaller tail probability and mirrored, the CDF is
   * symmetric about 0.
   */
  quantile(p: number): number {
    if (!(p > 0 && p < 1)) {
      throw new DomainError(`Student-t quantile is only defined for p in (0, 1), got ${p}`, {
        p,
        df: this.degreesOfFreedom,
      });
    }
    if (p === 0.5) return 0;
    return p > 0.5 ? this.upperTailQuantile(1 - p) : -this.upperTailQuantile(p);
  }

  /**
   * x > 0 with F(-x) = tail, for 0 < tail < 0.5.
   *
   * Safeguarded Newton iteration inside a bracket that always holds the root,
   * falling back to bisection whenever a Newton step leaves it. Throws
   * ConvergenceError when the root cannot be bracketed or after
   * MAX_QUANTILE_ITERATIONS steps.
   */
  protected upperTailQuantile(tail: number): number {
    // Tails are heavier than the normal, so the normal quantile is a lower starting point
    const normalStart = -standardNormalQuantile(tail);

    let lower = 0;
    let upper = Math.max(1, 2 * normalStart);
    let expansions = 0;
    while (this.cdf(-upper) > tail) {
      if (++expansions > MAX_BRACKET_EXPANSIONS) {
        throw new ConvergenceError('Student-t quantile: could not bracket the root', {
          tail,
          df: this.degreesOfFreedom,
          upper,
        });
      }
      lower = upper;
      upper *= 2;
    }

    let x = Math.min(Math.max(normalStart, lower), upper);
    for (let iteration = 0; iteration < MAX_QUANTILE_ITERATIONS; iteration++) {
      // Negative while x is still short of the root
      const residual = tail - this.cdf(-x);
      if (residual === 0) return x;

      if (residual < 0) {
        lower = x;
      } else {
        upper = x;
      }
      if (upper - lower <= RELATIVE_TOLERANCE * Math.max(1, Math.abs(x))) {
        return 0.5 * (lower + upper);
      }

      const density = this.pdf(x);
      let next = density > 0 ? x - residual / density : NaN;
      if (!(next > lower && next < upper)) {
        next = 0.5 * (lower + upper);
      }

      if (Math.abs(next - x) <= RELATIVE_TOLERANCE * Math.max(1, Math.abs(next))) {
        return next;
      }
      x = next;
    }

    throw new ConvergenceError(
      `Student-t quantile did not converge within ${MAX_QUANTILE_ITERATIONS} iterations`,
      { tail, df: this.degreesOfFreedom, lastEstimate: x }
    );
  }

  /**
   * Two-sided p-value of a t statistic, 2·F(-|t|)
   */
  twoSidedPValue(statistic: number): number {
    if (Number.isNaN(statistic)) return NaN;
    if (statistic === 0) return 1;
    return Math.min(1, 2 * this.cdf(-Math.abs(statistic)));
  }

  /**
   * Two-sided critical value t_{1-α/2, df}
   */
  criticalValue(alpha: number): number {
    return -this.quantile(alpha / 2);
  }

  /**
   * Mean is 0 for df > 1, undefined otherwise
   */
  mean(): number {
    return this.degreesOfFreedom > 1 ? 0 : NaN;
  }

  /**
   * df / (df - 2) for df > 2, infinite for 1 < df ≤ 2, undefined otherwise
   */
  variance(): number {
    if (this.degreesOfFreedom > 2) return this.degreesOfFreedom / (this.degreesOfFreedom - 2);
    if (this.degreesOfFreedom > 1) return Infinity;
    return NaN;
  }

  support(): { min: number; max: number } {
    return { min: -Infinity, max: Infinity };
  }

  df(): number {
    return this.degreesOfFreedom;
  }
}
