import { format } from 'd3-format';
import { ConfidenceInterval } from '../../inference/intervals';

const groupThousands = format(',');

/**
 * Round half away from zero, so that x and -x round to opposite values
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = Math.pow(10, decimals);
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

/**
 * Value formatters for the tabular result row
 */
export const Formatters = {
  /** Fraction rendered as a percentage: 0.2043 → "20.43%" */
  percentage: (decimals: number = 2) => (fraction: number) =>
    `${(fraction * 100).toFixed(decimals)}%`,

  number: (decimals: number = 4) => (d: number) => d.toFixed(decimals),

  /** Integer with thousands separators: 3641 → "3,641" */
  thousands: (d: number) => groupThousands(d),

  interval: (interval: ConfidenceInterval, formatter: (d: number) => string) =>
    `[${formatter(interval.lower)}, ${formatter(interval.upper)}]`,

  /** "<total>/<n>" with the total truncated to an integer */
  metricFormula: (total: number, n: number) => `${Math.trunc(total)}/${n}`,

  /** "<ratio>% (<required_n>)" */
  sampleSize: (actualRatio: number, requiredN: number): string =>
    `${(actualRatio * 100).toFixed(2)}% (${groupThousands(requiredN)})`,
};
