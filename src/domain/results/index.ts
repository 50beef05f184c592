/**
 * Result objects for test analysis
 */

export { AnalysisResult } from './AnalysisResult';
export type { CellValue } from './AnalysisResult';
export type { ResultMetadata, TestKind } from './ResultMetadata';
export { AbTestResult, ROW_COLUMNS } from './AbTestResult';
export type { AbTestDetails, TestResultRow } from './AbTestResult';
export { Formatters, roundTo } from './formatters';
