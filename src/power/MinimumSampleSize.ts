// src/power/MinimumSampleSize.ts
import { GroupSummary } from '../core/data';
import { powerQuantile, twoSidedCriticalValue } from '../core/distributions';
import { UndefinedMssError } from '../core/errors';
import { InputValidator } from '../domain/validation';

/**
 * Inputs of the post-hoc sample size calculation
 */
export interface MssScenario {
  /** Observed absolute effect Δ = T - C */
  effect: number;
  /** Per-observation variance of the control arm (p(1-p) or s²) */
  controlVariance: number;
  /** Per-observation variance of the treatment arm */
  treatmentVariance: number;
  alpha: number;
  power: number;
  /** Control units per treatment unit, k = n_c / n_t */
  allocationRatio: number;
  /** Treatment units actually observed */
  treatmentCount: number;
}

export interface MssOutcome {
  /** Minimum treatment-arm size that detects the observed effect at the target power */
  readonly requiredN: number;
  /** treatmentCount / requiredN */
  readonly actualRatio: number;
}

/**
 * Post-hoc minimum sample size.
 *
 * Answers "how many treatment units would this experiment have needed to
 * detect the effect it observed, at the configured alpha and power?" using
 * the normal approximation for both the proportion and the mean case:
 *
 *   n_t = (z_{1-α/2} + z_{power})² · (σ_c²/k + σ_t²) / Δ²
 *
 * rounded up. Throws UndefinedMssError when Δ is zero or the result is not a
 * finite positive number.
 */
export function minimumSampleSize(scenario: MssScenario): MssOutcome {
  InputValidator.validateUnitInterval('alpha', scenario.alpha);
  InputValidator.validateUnitInterval('power', scenario.power);
  InputValidator.validateAllocationRatio(scenario.allocationRatio);

  const effect = Math.abs(scenario.effect);
  if (!(effect > 0)) {
    throw new UndefinedMssError('Minimum sample size is undefined for a zero observed effect', {
      effect: scenario.effect,
    });
  }

  const zSum = twoSidedCriticalValue(scenario.alpha) + powerQuantile(scenario.power);
  const spread =
    scenario.controlVariance / scenario.allocationRatio + scenario.treatmentVariance;
  const rawN = (zSum * zSum * spread) / (effect * effect);

  if (!Number.isFinite(rawN) || rawN <= 0) {
    throw new UndefinedMssError('Minimum sample size is not a finite positive number', {
      effect: scenario.effect,
      controlVariance: scenario.controlVariance,
      treatmentVariance: scenario.treatmentVariance,
      allocationRatio: scenario.allocationRatio,
      rawN,
    });
  }

  const requiredN = Math.ceil(rawN);
  return Object.freeze({ requiredN, actualRatio: scenario.treatmentCount / requiredN });
}

/**
 * Sample size for the effect observed between two group summaries.
 * The allocation ratio defaults to the observed n_c / n_t.
 *
 * A proportion of exactly 0 or 1 has no sampling variance, so the formula
 * would return a size that ignores that arm; it is reported as undefined.
 */
export function posthocSampleSize(
  control: GroupSummary,
  treatment: GroupSummary,
  alpha: number,
  power: number,
  allocationRatio: number = control.count / treatment.count
): MssOutcome {
  for (const [arm, summary] of [
    ['control', control],
    ['treatment', treatment],
  ] as const) {
    if (summary.kind === 'proportion' && !(summary.estimate > 0 && summary.estimate < 1)) {
      throw new UndefinedMssError(
        `Minimum sample size is undefined when the ${arm} proportion is ${summary.estimate}`,
        { arm, estimate: summary.estimate }
      );
    }
  }

  return minimumSampleSize({
    effect: treatment.estimate - control.estimate,
    controlVariance: control.observationVariance,
    treatmentVariance: treatment.observationVariance,
    alpha,
    power,
    allocationRatio,
    treatmentCount: treatment.count,
  });
}
