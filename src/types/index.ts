/**
 * Type definitions for the CDR/CMR exception pipeline
 */

export type Leg = 'source' | 'destination';

export type CauseDimension = 'orig_cause' | 'dest_cause';
export type ExceptionDimension = CauseDimension | 'quality';

export type Classification = 'none' | 'amber' | 'red';

/** Marker used as the group value for the quality dimension */
export const POOR_QUALITY = 'POOR';

export interface QualityMetrics {
  deviceName?: string;
  avgMos?: number;
  ccr?: number;
}

export interface CallRecord {
  kind: 'call';
  callId: string;
  originationTime: Date;
  origIp: string;
  destIp: string;
  callingNumber: string;
  originalCalledNumber: string;
  finalCalledNumber: string;
  origCauseCode?: number;
  destCauseCode?: number;
  origDeviceName?: string;
  destDeviceName?: string;
  duration: number;
  origQuality?: QualityMetrics;
  destQuality?: QualityMetrics;
}

export interface QualityRecord {
  kind: 'quality';
  callId: string;
  timestamp: Date;
  deviceName?: string;
  /** Unset when the export has a single device column; resolved during correlation */
  leg?: Leg;
  avgMos?: number;
  ccr?: number;
  duration: number;
}

export interface RowParseError {
  kind: 'error';
  rowNumber: number;
  row: readonly string[];
  reason: string;
}

export type ParsedRecord = CallRecord | QualityRecord;
export type ParseResult = ParsedRecord | RowParseError;

/** A correlated call, frozen once the index is finalized */
export type Call = Readonly<CallRecord>;

export interface ExceptionGroupKey {
  deviceName: string;
  role: Leg;
  dimension: ExceptionDimension;
  /** Cause code for cause dimensions, POOR_QUALITY for quality */
  value: number | typeof POOR_QUALITY;
}

export interface ExceptionGroup {
  key: ExceptionGroupKey;
  calls: Call[];
  instanceCount: number;
  classification: Classification;
}

export interface ExceptionSettings {
  excludedCauseCodes: ReadonlySet<number>;
  causeAmberThreshold: number;
  causeRedThreshold: number;
  mosThreshold: number;
  ccrThreshold: number;
  mosAmberThreshold: number;
  mosRedThreshold: number;
}

export type CauseCodeDescriptions = ReadonlyMap<number, string>;

export interface DateWindow {
  start: Date;
  end: Date;
}

export interface SeverityCounts {
  amber: number;
  red: number;
}

export interface ClassificationResult {
  exceptions: ExceptionGroup[];
  amberCount: number;
  redCount: number;
  counts: {
    cause: SeverityCounts;
    quality: SeverityCounts;
  };
}

export interface CountEntry<K> {
  key: K;
  count: number;
}

export interface SummaryTotals {
  dateHistogram: CountEntry<string>[];
  deviceTotals: CountEntry<string>[];
  causeTotals: CountEntry<number>[];
  qualityDeviceTotals: CountEntry<string>[];
}

export interface ProcessingDiagnostics {
  filesRead: number;
  filesSkipped: number;
  rowsRead: number;
  parseErrors: number;
  callRecords: number;
  qualityRecords: number;
  orphanQualityRecords: number;
  callsCorrelated: number;
  callsInRange: number;
}

export interface ExceptionReport extends ClassificationResult {
  window: DateWindow;
  summary: SummaryTotals;
  diagnostics: ProcessingDiagnostics;
  /** True when no call survived correlation and filtering */
  empty: boolean;
}
