/**
 * Base interface for the continuous reference distributions
 * used to turn test statistics into p-values and critical values
 */
export interface Distribution {
  /**
   * Probability density function
   */
  pdf(x: number): number;

  /**
   * Cumulative distribution function
   */
  cdf(x: number): number;

  /**
   * Inverse CDF for p in (0, 1)
   */
  quantile(p: number): number;

  /**
   * Expected value of the distribution
   */
  mean(): number;

  /**
   * Variance of the distribution
   */
  variance(): number;

  /**
   * Support of the distribution (where the PDF is positive)
   */
  support(): { min: number; max: number };
}
