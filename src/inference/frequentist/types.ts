/**
 * Shared types for the frequentist two-sample tests
 */

import { GroupSummary } from '../../core/data';

/**
 * Test statistic and its two-sided p-value
 */
export interface TestResult {
  readonly statistic: number;
  /** Two-sided p-value in [0, 1] */
  readonly pValue: number;
  /** Welch–Satterthwaite degrees of freedom (mean test only) */
  readonly df?: number;
}

/**
 * Output of a test: the statistic plus the summaries that produced it,
 * and the critical value the interval layer must use
 */
export interface TwoSampleTestOutcome {
  readonly control: GroupSummary;
  readonly treatment: GroupSummary;
  readonly test: TestResult;
  /** z_{1-α/2} or t_{1-α/2, df} */
  readonly criticalValue: number;
}

/**
 * Variance model used in the denominator of the proportion z-statistic
 */
export type StatisticVariance = 'unpooled' | 'pooled';
