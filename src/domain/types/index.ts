export type { AnalysisOptions, ResolvedAnalysisOptions } from './options';
export { DEFAULT_ANALYSIS_OPTIONS, resolveOptions } from './options';
