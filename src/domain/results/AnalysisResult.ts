/**
 * Base class for analysis results
 */

import { ResultMetadata } from './ResultMetadata';

export type CellValue = string | number | null | undefined;

/**
 * Abstract base class that all analysis results extend
 * Provides common functionality for serialization and export
 */
export abstract class AnalysisResult {
  /**
   * @param metadata - Metadata about the analysis
   */
  constructor(protected readonly metadata: ResultMetadata) {}

  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * Convert the result to a JSON-serializable object
   */
  abstract toJSON(): object;

  /**
   * Header and values of the single tabular row used for CSV export
   */
  protected abstract toCells(): { headers: string[]; values: CellValue[] };

  /**
   * Export the result in the specified format
   */
  export(format: 'json' | 'csv'): string {
    if (format === 'json') {
      return JSON.stringify(this.toJSON(), null, 2);
    }
    return this.exportCSV();
  }

  /**
   * Two-line CSV: header row and value row.
   * Missing values become empty cells; cells with commas or quotes are quoted.
   */
  protected exportCSV(): string {
    const { headers, values } = this.toCells();
    return [headers.map(escapeCell).join(','), values.map(escapeCell).join(',')].join('\n');
  }
}

function escapeCell(value: CellValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (/[",\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}
