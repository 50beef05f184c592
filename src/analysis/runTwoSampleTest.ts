/**
 * Shared pipeline: test → delta-method intervals → post-hoc sample size → result
 */

import { UndefinedMssError, wrapError } from '../core/errors';
import { ResolvedAnalysisOptions } from '../domain/types';
import { AbTestResult } from '../domain/results';
import { TwoSampleTest } from '../inference/frequentist';
import { upliftEstimate, upliftIntervals } from '../inference/intervals';
import { MssOutcome, posthocSampleSize } from '../power/MinimumSampleSize';

/**
 * Run a test end to end. Anything thrown that is not already an
 * AbTestError leaves as an INTERNAL_ERROR AbTestError.
 */
export function runTwoSampleTest<TInput>(
  test: TwoSampleTest<TInput>,
  input: TInput,
  options: ResolvedAnalysisOptions
): AbTestResult {
  try {
    return analyze(test, input, options);
  } catch (error) {
    throw wrapError(error);
  }
}

function analyze<TInput>(
  test: TwoSampleTest<TInput>,
  input: TInput,
  options: ResolvedAnalysisOptions
): AbTestResult {
  const kind = test.name;
  const { control, treatment, test: testResult, criticalValue } = test.run(input, options.alpha);
  const warnings: string[] = [];

  const uplift = upliftEstimate(control, treatment);
  const intervals = upliftIntervals(control, treatment, criticalValue);
  if (intervals.relativeError) {
    warnings.push(`delta_relative/CI_relative: ${intervals.relativeError.message}`);
  }

  const allocationRatio = options.allocationRatio ?? control.count / treatment.count;
  let mss: MssOutcome | null = null;
  try {
    mss = posthocSampleSize(control, treatment, options.alpha, options.power, allocationRatio);
  } catch (error) {
    if (!(error instanceof UndefinedMssError)) {
      throw error;
    }
    warnings.push(`MSS_posthoc: ${error.message}`);
  }

  if (options.debug) {
    for (const warning of warnings) {
      console.warn(`⚠️ [${kind}] ${warning}`);
    }
  }

  return new AbTestResult(
    { control, treatment, test: testResult, criticalValue, uplift, intervals, mss },
    {
      test: kind,
      alpha: options.alpha,
      power: options.power,
      allocationRatio,
      ...(kind === 'proportions-ztest' ? { statisticVariance: options.statisticVariance } : {}),
      warnings,
    }
  );
}
