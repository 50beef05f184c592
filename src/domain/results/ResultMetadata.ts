/**
 * Metadata structure for test results
 */

import { StatisticVariance } from '../../inference/frequentist/types';

export type TestKind = 'proportions-ztest' | 'welch-ttest';

/**
 * Metadata that accompanies every test result. It holds no timestamps,
 * so identical inputs produce identical results.
 */
export interface ResultMetadata {
  /** Which test produced the result */
  test: TestKind;

  /** Significance level used for the test and intervals */
  alpha: number;

  /** Target power used by the sample size solver */
  power: number;

  /** Control units per treatment unit used by the sample size solver */
  allocationRatio: number;

  /** Denominator of the z-statistic (proportion test only) */
  statisticVariance?: StatisticVariance;

  /** Fields that could not be computed, and why */
  warnings: string[];
}
