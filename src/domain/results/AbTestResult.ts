/**
 * Result of a two-sample test: the unrounded numbers plus the
 * single-row tabular record callers usually want
 */

import { AnalysisResult, CellValue } from './AnalysisResult';
import { ResultMetadata } from './ResultMetadata';
import { Formatters, roundTo } from './formatters';
import { GroupSummary } from '../../core/data';
import { TestResult } from '../../inference/frequentist/types';
import { UpliftEstimate, UpliftIntervals } from '../../inference/intervals';
import { MssOutcome } from '../../power/MinimumSampleSize';

/**
 * Everything computed for one test, unrounded
 */
export interface AbTestDetails {
  control: GroupSummary;
  treatment: GroupSummary;
  test: TestResult;
  /** Critical value shared by both intervals */
  criticalValue: number;
  uplift: UpliftEstimate;
  intervals: UpliftIntervals;
  /** null when the sample size is undefined (e.g. zero effect) */
  mss: MssOutcome | null;
}

/**
 * The tabular record. Missing values are null.
 */
export interface TestResultRow {
  /** "<treatment total>/<treatment n>" */
  metricFormula: string;
  /** Treatment estimate */
  metricValue: number;
  /** Relative uplift in percent */
  deltaRelative: number | null;
  deltaAbsolute: number;
  /** Rounded to 5 decimals */
  pValue: number;
  /** "[l%, u%]" */
  ciRelative: string | null;
  /** "[l, u]" */
  ciAbsolute: string;
  /** "<ratio>% (<required_n>)" */
  mssPosthoc: string | null;
  /** Rounded to 2 decimals */
  statistic: number;
  /** Welch–Satterthwaite df rounded to 2 decimals (mean test only) */
  df?: number;
}

/** Column names of the tabular export, in order */
export const ROW_COLUMNS: ReadonlyArray<readonly [keyof TestResultRow, string]> = [
  ['metricFormula', 'metric_formula'],
  ['metricValue', 'metric_value'],
  ['deltaRelative', 'delta_relative'],
  ['deltaAbsolute', 'delta_absolute'],
  ['pValue', 'p_value'],
  ['ciRelative', 'CI_relative'],
  ['ciAbsolute', 'CI_absolute'],
  ['mssPosthoc', 'MSS_posthoc'],
  ['statistic', 'statistic'],
  ['df', 'df'],
];

export class AbTestResult extends AnalysisResult {
  constructor(
    private readonly details: AbTestDetails,
    metadata: ResultMetadata
  ) {
    super(metadata);
  }

  getDetails(): AbTestDetails {
    return this.details;
  }

  /**
   * Assemble the tabular record
   */
  toRow(): TestResultRow {
    const { treatment, test, uplift, intervals, mss } = this.details;

    const row: TestResultRow = {
      metricFormula: Formatters.metricFormula(treatment.total, treatment.count),
      metricValue: treatment.estimate,
      deltaRelative: uplift.relative === null ? null : uplift.relative * 100,
      deltaAbsolute: uplift.absolute,
      pValue: roundTo(test.pValue, 5),
      ciRelative:
        intervals.relative === null
          ? null
          : Formatters.interval(intervals.relative, Formatters.percentage(2)),
      ciAbsolute: Formatters.interval(intervals.absolute, Formatters.number(4)),
      mssPosthoc: mss === null ? null : Formatters.sampleSize(mss.actualRatio, mss.requiredN),
      statistic: roundTo(test.statistic, 2),
    };

    if (test.df !== undefined) {
      row.df = roundTo(test.df, 2);
    }

    return row;
  }

  toJSON(): object {
    const { control, treatment, test, criticalValue, uplift, intervals, mss } = this.details;
    return {
      row: this.toRow(),
      details: {
        control,
        treatment,
        test,
        criticalValue,
        uplift,
        intervals: { absolute: intervals.absolute, relative: intervals.relative },
        mss,
      },
      metadata: this.metadata,
    };
  }

  protected toCells(): { headers: string[]; values: CellValue[] } {
    const row = this.toRow();
    const columns = ROW_COLUMNS.filter(([key]) => key !== 'df' || row.df !== undefined);
    return {
      headers: columns.map(([, header]) => header),
      values: columns.map(([key]) => row[key]),
    };
  }
}
