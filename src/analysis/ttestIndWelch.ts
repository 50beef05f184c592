import { AnalysisOptions, resolveOptions } from '../domain/types';
import { AbTestResult } from '../domain/results';
import { WelchTTest } from '../inference/frequentist';
import { runTwoSampleTest } from './runTwoSampleTest';

/**
 * Welch's t-test on the means of two independent samples.
 * NaN observations are ignored; each group needs at least 2 of the rest.
 */
export function ttestIndWelch(
  controlValues: Iterable<number>,
  treatmentValues: Iterable<number>,
  options: AnalysisOptions = {}
): AbTestResult {
  const resolved = resolveOptions(options);

  return runTwoSampleTest(new WelchTTest(), { controlValues, treatmentValues }, resolved);
}
