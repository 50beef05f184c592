export type { TestResult, TwoSampleTestOutcome, StatisticVariance } from './types';
export { TwoSampleTest } from './TwoSampleTest';
export { ProportionZTest } from './ProportionZTest';
export type { ProportionCounts } from './ProportionZTest';
export { WelchTTest, welchSatterthwaiteDf } from './WelchTTest';
export type { SampleInput } from './WelchTTest';
