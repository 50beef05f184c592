/**
 * Analysis options shared by both public tests
 */

import { StatisticVariance } from '../../inference/frequentist/types';
import { InputValidator } from '../validation';

export interface AnalysisOptions {
  /** Significance level, (0, 1). Default 0.05 */
  alpha?: number;

  /** Target power 1-β for the post-hoc sample size, (0, 1). Default 0.8 */
  power?: number;

  /**
   * Control units per treatment unit used by the sample size solver.
   * Defaults to the observed n_c / n_t.
   */
  allocationRatio?: number;

  /** Denominator of the proportion z-statistic. Default 'unpooled' */
  statisticVariance?: StatisticVariance;

  /** Echo warnings to the console. Default false */
  debug?: boolean;
}

/**
 * Options after defaults are applied; allocationRatio stays optional
 * because its default depends on the data
 */
export interface ResolvedAnalysisOptions {
  alpha: number;
  power: number;
  allocationRatio?: number;
  statisticVariance: StatisticVariance;
  debug: boolean;
}

export const DEFAULT_ANALYSIS_OPTIONS = Object.freeze({
  alpha: 0.05,
  power: 0.8,
  statisticVariance: 'unpooled',
  debug: false,
} as const);

/**
 * Merge caller options over the defaults and validate them
 */
export function resolveOptions(options: AnalysisOptions = {}): ResolvedAnalysisOptions {
  const resolved: ResolvedAnalysisOptions = {
    alpha: options.alpha ?? DEFAULT_ANALYSIS_OPTIONS.alpha,
    power: options.power ?? DEFAULT_ANALYSIS_OPTIONS.power,
    statisticVariance: options.statisticVariance ?? DEFAULT_ANALYSIS_OPTIONS.statisticVariance,
    debug: options.debug ?? DEFAULT_ANALYSIS_OPTIONS.debug,
  };

  InputValidator.validateUnitInterval('alpha', resolved.alpha);
  InputValidator.validateUnitInterval('power', resolved.power);
  InputValidator.validateStatisticVariance(resolved.statisticVariance);

  if (options.allocationRatio !== undefined) {
    InputValidator.validateAllocationRatio(options.allocationRatio);
    resolved.allocationRatio = options.allocationRatio;
  }

  return resolved;
}
