/**
 * Input Validator
 *
 * Boundary checks for the public test functions.
 * Focuses on structural validity of the inputs, not on whether a
 * statistic is defined for them (that is the job of the inference layer).
 */

import { ValidationError } from '../../core/errors';

export class InputValidator {
  /**
   * Validate a probability-like option that must lie in the open interval (0, 1)
   */
  static validateUnitInterval(name: string, value: number): void {
    if (typeof value !== 'number' || !(value > 0 && value < 1)) {
      throw new ValidationError(`${name} must be in the open interval (0, 1)`, {
        [name]: value,
      });
    }
  }

  /**
   * Validate the control/treatment counts of a proportion test
   */
  static validateProportionCounts(
    controlN: number,
    controlSuccess: number,
    treatmentN: number,
    treatmentSuccess: number
  ): void {
    this.validateArmCounts('control', controlN, controlSuccess);
    this.validateArmCounts('treatment', treatmentN, treatmentSuccess);
  }

  /**
   * Validate an allocation ratio override (control size per treatment unit)
   */
  static validateAllocationRatio(ratio: number): void {
    if (typeof ratio !== 'number' || !Number.isFinite(ratio) || ratio <= 0) {
      throw new ValidationError('allocationRatio must be a positive finite number', {
        allocationRatio: ratio,
      });
    }
  }

  /**
   * Validate the variance model of the proportion z-statistic
   */
  static validateStatisticVariance(value: string): void {
    if (value !== 'unpooled' && value !== 'pooled') {
      throw new ValidationError("statisticVariance must be 'unpooled' or 'pooled'", {
        statisticVariance: value,
      });
    }
  }

  /**
   * Collect the observations of one arm into an array.
   * NaN entries are treated as missing and dropped; infinities are rejected.
   */
  static collectObservations(arm: string, values: Iterable<number>): number[] {
    if (values === null || values === undefined || typeof values[Symbol.iterator] !== 'function') {
      throw new ValidationError(`${arm} values must be an iterable of numbers`, { arm });
    }

    const observations: number[] = [];
    let index = 0;
    for (const value of values) {
      if (typeof value !== 'number') {
        throw new ValidationError(`${arm} values must be numbers`, {
          arm,
          index,
          type: typeof value,
        });
      }
      if (Number.isNaN(value)) {
        index++;
        continue;
      }
      if (!Number.isFinite(value)) {
        throw new ValidationError(`${arm} values must be finite`, { arm, index, value });
      }
      observations.push(value);
      index++;
    }

    return observations;
  }

  /**
   * Validate that each arm of a mean test has enough observations for a sample variance
   */
  static validateObservationCounts(controlCount: number, treatmentCount: number): void {
    if (controlCount < 2 || treatmentCount < 2) {
      throw new ValidationError(
        `Each group must have at least 2 observations (for variance). Got control n=${controlCount}, treatment n=${treatmentCount}.`,
        { controlCount, treatmentCount }
      );
    }
  }

  private static validateArmCounts(arm: string, n: number, success: number): void {
    if (!Number.isInteger(n) || n <= 0) {
      throw new ValidationError(`${arm} n must be a positive integer`, { arm, n });
    }
    if (!Number.isInteger(success) || success < 0) {
      throw new ValidationError(`${arm} success count must be a non-negative integer`, {
        arm,
        success,
      });
    }
    if (success > n) {
      throw new ValidationError(`${arm} success count must not exceed ${arm} n`, {
        arm,
        n,
        success,
      });
    }
  }
}
