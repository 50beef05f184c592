import { describe, it, expect, vi, afterEach } from 'vitest';
import { proportionsZTest } from '../../analysis';
import { ValidationError } from '../../core/errors';

describe('proportionsZTest', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reproduce the reference example', () => {
    const row = proportionsZTest(998, 101, 1001, 122, { alpha: 0.05, power: 0.8 }).toRow();

    expect(row.metricFormula).toBe('122/1001');
    expect(row.metricValue).toBeCloseTo(0.121878, 6);
    expect(row.deltaRelative).toBeCloseTo(20.43006498452042, 8);
    expect(row.deltaAbsolute).toBeCloseTo(0.02067571706850263, 12);
    expect(row.pValue).toBe(0.1418);
    expect(row.ciRelative).toBe('[-9.52%, 50.38%]');
    expect(row.ciAbsolute).toBe('[-0.0069, 0.0483]');
    expect(row.mssPosthoc).toBe('27.49% (3,641)');
    expect(row.statistic).toBe(1.47);
    expect(row.df).toBeUndefined();
  });

  it('should default alpha to 0.05 and power to 0.8', () => {
    const defaults = proportionsZTest(998, 101, 1001, 122);
    const explicit = proportionsZTest(998, 101, 1001, 122, { alpha: 0.05, power: 0.8 });

    expect(defaults.toRow()).toEqual(explicit.toRow());
    expect(defaults.getMetadata()).toMatchObject({
      test: 'proportions-ztest',
      alpha: 0.05,
      power: 0.8,
      statisticVariance: 'unpooled',
      warnings: [],
    });
    expect(defaults.getMetadata().allocationRatio).toBeCloseTo(998 / 1001, 12);
  });

  it('should give statistic 0 and p-value 1 for equal proportions', () => {
    const result = proportionsZTest(1000, 100, 2000, 200);
    const row = result.toRow();

    expect(row.statistic).toBe(0);
    expect(row.pValue).toBe(1);
    expect(row.deltaAbsolute).toBe(0);
    expect(row.mssPosthoc).toBeNull();
    expect(result.getMetadata().warnings).toEqual([
      'MSS_posthoc: Minimum sample size is undefined for a zero observed effect',
    ]);
  });

  it('should keep absolute fields when the control proportion is zero', () => {
    const result = proportionsZTest(100, 0, 100, 5);
    const row = result.toRow();

    expect(row.deltaRelative).toBeNull();
    expect(row.ciRelative).toBeNull();
    expect(row.deltaAbsolute).toBe(0.05);
    expect(row.ciAbsolute).toBe('[0.0073, 0.0927]');
    expect(row.statistic).toBe(2.29);
    expect(row.pValue).toBe(0.02178);
    expect(row.mssPosthoc).toBeNull();
    expect(result.getMetadata().warnings).toEqual([
      'delta_relative/CI_relative: Relative uplift is undefined when the control estimate is zero',
      'MSS_posthoc: Minimum sample size is undefined when the control proportion is 0',
    ]);
  });

  it('should leave the sample size empty when an arm converts fully', () => {
    const result = proportionsZTest(500, 500, 500, 493);

    expect(result.toRow().mssPosthoc).toBeNull();
    expect(result.toRow().deltaAbsolute).toBeCloseTo(-0.014, 12);
    expect(result.getMetadata().warnings).toEqual([
      'MSS_posthoc: Minimum sample size is undefined when the control proportion is 1',
    ]);
  });

  it('should be antisymmetric when the arms are swapped', () => {
    const forward = proportionsZTest(998, 101, 1001, 122).getDetails();
    const backward = proportionsZTest(1001, 122, 998, 101).getDetails();

    expect(backward.uplift.absolute).toBe(-forward.uplift.absolute);
    expect(backward.test.statistic).toBeCloseTo(-forward.test.statistic, 12);
    expect(backward.test.pValue).toBeCloseTo(forward.test.pValue, 12);
    expect(forward.uplift.relative).toBeGreaterThan(0);
    expect(backward.uplift.relative).toBeCloseTo(-0.16964256381615684, 10);
  });

  it('should contain the absolute difference in its absolute interval', () => {
    const cases: Array<[number, number, number, number]> = [
      [998, 101, 1001, 122],
      [50, 3, 40, 9],
      [10000, 5000, 10000, 4900],
      [20, 0, 30, 30],
    ];
    for (const [cn, cs, tn, ts] of cases) {
      const { uplift, intervals, test } = proportionsZTest(cn, cs, tn, ts).getDetails();
      expect(intervals.absolute.lower).toBeLessThanOrEqual(uplift.absolute);
      expect(intervals.absolute.upper).toBeGreaterThanOrEqual(uplift.absolute);
      expect(test.pValue).toBeGreaterThanOrEqual(0);
      expect(test.pValue).toBeLessThanOrEqual(1);
    }
  });

  it('should use the pooled statistic when asked, keeping unpooled intervals', () => {
    const pooled = proportionsZTest(998, 101, 1001, 122, { statisticVariance: 'pooled' });
    const unpooled = proportionsZTest(998, 101, 1001, 122);

    expect(pooled.getDetails().test.statistic).toBeCloseTo(1.468166717849896, 8);
    expect(pooled.toRow().ciAbsolute).toBe(unpooled.toRow().ciAbsolute);
    expect(pooled.getMetadata().statisticVariance).toBe('pooled');
  });

  it('should honour an allocation ratio override', () => {
    const result = proportionsZTest(998, 101, 1001, 122, { allocationRatio: 1 });
    expect(result.getDetails().mss?.requiredN).toBe(3636);
    expect(result.getMetadata().allocationRatio).toBe(1);
  });

  it('should echo warnings to the console in debug mode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    proportionsZTest(100, 0, 100, 5, { debug: true });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      '⚠️ [proportions-ztest] delta_relative/CI_relative: Relative uplift is undefined when the control estimate is zero'
    );
    expect(warn).toHaveBeenNthCalledWith(
      2,
      '⚠️ [proportions-ztest] MSS_posthoc: Minimum sample size is undefined when the control proportion is 0'
    );

    warn.mockClear();
    proportionsZTest(100, 0, 100, 5);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should reject invalid input at the boundary', () => {
    expect(() => proportionsZTest(0, 0, 100, 5)).toThrow(ValidationError);
    expect(() => proportionsZTest(100, 101, 100, 5)).toThrow(ValidationError);
    expect(() => proportionsZTest(100, 1, 100, 5, { alpha: 1.2 })).toThrow(ValidationError);
    expect(() => proportionsZTest(100, 1, 100, 5, { power: 0 })).toThrow(ValidationError);
    expect(() => proportionsZTest(100, 1, 100, 5, { allocationRatio: -1 })).toThrow(
      ValidationError
    );
  });

  it('should be idempotent', () => {
    const first = proportionsZTest(998, 101, 1001, 122);
    const second = proportionsZTest(998, 101, 1001, 122);
    expect(second.toJSON()).toEqual(first.toJSON());
    expect(second.export('csv')).toBe(first.export('csv'));
  });
});
