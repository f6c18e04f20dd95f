/**
 * Services barrel export
 */

export { detectSchema, parseRow } from './recordParser.js';
export type { RowSchema, CdrSchema, CmrSchema } from './recordParser.js';
export { extractQualityMetrics } from './vqMetrics.js';
export { CallIndex } from './callIndex.js';
export type { CorrelationResult, CallIndexStats } from './callIndex.js';
export { filterByDateRange, isWithinWindow } from './dateRangeFilter.js';
export { classifyExceptions, buildGroups, groupKeysForCall, isPoorQuality } from './exceptionClassifier.js';
export { aggregateSummary } from './summaryAggregator.js';
export { readRecords } from './csvReader.js';
export { ReportWriter, toReportDocument } from './reportWriter.js';
export type { ReportDocument } from './reportWriter.js';
