/**
 * Delta-method confidence intervals for the uplift
 *
 * The absolute difference Δ = T - C has variance Var(T) + Var(C). The
 * relative uplift r = T/C - 1 is non-linear in C, so its variance is the
 * first-order Taylor approximation with gradient (1/C, -T/C²):
 *
 *   Var(r) ≈ Var(T)/C² + T²·Var(C)/C⁴
 *
 * T and C are treated as independent. Both intervals share one critical value.
 */

import { GroupSummary } from '../../core/data';
import { DomainError } from '../../core/errors';

/** Control estimates at or below this magnitude are treated as zero */
export const ZERO_CONTROL_TOLERANCE = 1e-10;

export interface ConfidenceInterval {
  readonly lower: number;
  readonly upper: number;
}

export interface UpliftEstimate {
  readonly absolute: number;
  /** (T - C) / C as a fraction; null when C is zero */
  readonly relative: number | null;
}

export interface UpliftIntervals {
  readonly absolute: ConfidenceInterval;
  /** null when the relative uplift is undefined, see relativeError */
  readonly relative: ConfidenceInterval | null;
  readonly relativeError?: DomainError;
}

/**
 * T - C
 */
export function absoluteDifference(control: GroupSummary, treatment: GroupSummary): number {
  return treatment.estimate - control.estimate;
}

/**
 * (T - C) / C; throws DomainError when C is zero
 */
export function relativeUplift(control: GroupSummary, treatment: GroupSummary): number {
  assertNonZeroControl(control);
  return (treatment.estimate - control.estimate) / control.estimate;
}

/**
 * Absolute and relative uplift; the relative part is null when undefined
 */
export function upliftEstimate(control: GroupSummary, treatment: GroupSummary): UpliftEstimate {
  const absolute = absoluteDifference(control, treatment);
  if (isZeroControl(control)) {
    return { absolute, relative: null };
  }
  return { absolute, relative: relativeUplift(control, treatment) };
}

/**
 * Δ ± c·sqrt(Var(T) + Var(C))
 */
export function absoluteDifferenceInterval(
  control: GroupSummary,
  treatment: GroupSummary,
  criticalValue: number
): ConfidenceInterval {
  const delta = absoluteDifference(control, treatment);
  const margin = criticalValue * Math.sqrt(control.variance + treatment.variance);
  return { lower: delta - margin, upper: delta + margin };
}

/**
 * First-order standard error of the relative uplift
 */
export function relativeUpliftStandardError(
  control: GroupSummary,
  treatment: GroupSummary
): number {
  assertNonZeroControl(control);

  const c = control.estimate;
  const t = treatment.estimate;
  const c2 = c * c;

  return Math.sqrt(treatment.variance / c2 + (t * t * control.variance) / (c2 * c2));
}

/**
 * r ± c·SE(r), as fractions; throws DomainError when C is zero
 */
export function relativeUpliftInterval(
  control: GroupSummary,
  treatment: GroupSummary,
  criticalValue: number
): ConfidenceInterval {
  const uplift = relativeUplift(control, treatment);
  const margin = criticalValue * relativeUpliftStandardError(control, treatment);
  return { lower: uplift - margin, upper: uplift + margin };
}

/**
 * Both intervals from one critical value. A zero control estimate only
 * voids the relative interval; the DomainError is returned alongside.
 */
export function upliftIntervals(
  control: GroupSummary,
  treatment: GroupSummary,
  criticalValue: number
): UpliftIntervals {
  const absolute = absoluteDifferenceInterval(control, treatment, criticalValue);

  try {
    return { absolute, relative: relativeUpliftInterval(control, treatment, criticalValue) };
  } catch (error) {
    if (error instanceof DomainError) {
      return { absolute, relative: null, relativeError: error };
    }
    throw error;
  }
}

function isZeroControl(control: GroupSummary): boolean {
  return Math.abs(control.estimate) <= ZERO_CONTROL_TOLERANCE;
}

function assertNonZeroControl(control: GroupSummary): void {
  if (isZeroControl(control)) {
    throw new DomainError('Relative uplift is undefined when the control estimate is zero', {
      controlEstimate: control.estimate,
    });
  }
}
