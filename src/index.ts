/**
 * Frequentist significance tests for A/B experiments
 *
 * Two-sample proportion z-test and Welch t-test, each with uplift,
 * delta-method confidence intervals and a post-hoc minimum sample size.
 */

// Public tests
export { proportionsZTest, ttestIndWelch } from './analysis';

// Error handling
export {
  AbTestError,
  ErrorCode,
  ValidationError,
  DegenerateVarianceError,
  DomainError,
  UndefinedMssError,
  ConvergenceError,
  isAbTestError,
  wrapError,
} from './core/errors';

// Reference distributions
export {
  NormalDistribution,
  StudentTDistribution,
  standardNormalCdf,
  standardNormalQuantile,
  twoSidedCriticalValue,
  powerQuantile,
  MAX_QUANTILE_ITERATIONS,
} from './core/distributions';

// Data structures
export * from './core/data';

// Building blocks
export { ProportionZTest, WelchTTest, welchSatterthwaiteDf } from './inference/frequentist';
export type {
  TestResult,
  TwoSampleTestOutcome,
  StatisticVariance,
  ProportionCounts,
  SampleInput,
} from './inference/frequentist';
export {
  upliftEstimate,
  upliftIntervals,
  absoluteDifferenceInterval,
  relativeUpliftInterval,
} from './inference/intervals';
export type { ConfidenceInterval, UpliftEstimate, UpliftIntervals } from './inference/intervals';
export { minimumSampleSize, posthocSampleSize } from './power/MinimumSampleSize';
export type { MssScenario, MssOutcome } from './power/MinimumSampleSize';

// Results and options
export { AbTestResult, ROW_COLUMNS } from './domain/results';
export type { AbTestDetails, TestResultRow, ResultMetadata, TestKind } from './domain/results';
export { DEFAULT_ANALYSIS_OPTIONS, resolveOptions } from './domain/types';
export type { AnalysisOptions, ResolvedAnalysisOptions } from './domain/types';

// Version
export const VERSION = '0.1.0';
