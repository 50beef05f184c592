/**
 * Core Data Model exports
 */

export type { GroupSummary, SummaryKind, SampleStatistics } from './GroupSummary';

export { GroupSummaryFactory, computeSampleStatistics } from './GroupSummary';
