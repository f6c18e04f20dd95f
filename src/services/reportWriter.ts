/**
 * Report writer - Serialises an exception report to a JSON document that a
 * presentation layer (HTML template, dashboard) can render directly
 */
import { FileManager } from '../utils/fileManager.js';
import { logger } from '../utils/logger.js';
import type {
  Call,
  CauseCodeDescriptions,
  Classification,
  ExceptionGroupKey,
  ExceptionReport,
  ProcessingDiagnostics,
  QualityMetrics,
  SeverityCounts,
} from '../types/index.js';

export interface CallSummary {
  callId: string;
  originationTime: string;
  origIp: string;
  destIp: string;
  callingNumber: string;
  originalCalledNumber: string;
  finalCalledNumber: string;
  origCauseCode: number | null;
  destCauseCode: number | null;
  origDeviceName: string | null;
  destDeviceName: string | null;
  duration: number;
  origQuality: QualityMetrics | null;
  destQuality: QualityMetrics | null;
}

export interface ExceptionEntry extends ExceptionGroupKey {
  description: string | null;
  classification: Exclude<Classification, 'none'>;
  instanceCount: number;
  calls: CallSummary[];
}

export interface ReportDocument {
  generatedAt: string;
  window: { start: string; end: string };
  empty: boolean;
  totals: {
    amber: number;
    red: number;
    cause: SeverityCounts;
    quality: SeverityCounts;
  };
  exceptions: ExceptionEntry[];
  summary: {
    dateHistogram: Array<{ date: string; count: number }>;
    deviceTotals: Array<{ deviceName: string; count: number }>;
    causeTotals: Array<{ causeCode: number; description: string | null; count: number }>;
    qualityDeviceTotals: Array<{ deviceName: string; count: number }>;
  };
  diagnostics: ProcessingDiagnostics;
}

function summariseCall(call: Call): CallSummary {
  return {
    callId: call.callId,
    originationTime: call.originationTime.toISOString(),
    origIp: call.origIp,
    destIp: call.destIp,
    callingNumber: call.callingNumber,
    originalCalledNumber: call.originalCalledNumber,
    finalCalledNumber: call.finalCalledNumber,
    origCauseCode: call.origCauseCode ?? null,
    destCauseCode: call.destCauseCode ?? null,
    origDeviceName: call.origDeviceName ?? null,
    destDeviceName: call.destDeviceName ?? null,
    duration: call.duration,
    origQuality: call.origQuality ?? null,
    destQuality: call.destQuality ?? null,
  };
}

export function toReportDocument(
  report: ExceptionReport,
  causeCodes: CauseCodeDescriptions,
  generatedAt: Date = new Date()
): ReportDocument {
  const describeCause = (code: number): string | null => causeCodes.get(code) ?? null;

  const exceptions: ExceptionEntry[] = [];
  for (const group of report.exceptions) {
    if (group.classification === 'none') continue;
    const { value } = group.key;
    exceptions.push({
      ...group.key,
      description: typeof value === 'number' ? describeCause(value) : null,
      classification: group.classification,
      instanceCount: group.instanceCount,
      calls: group.calls.map(summariseCall),
    });
  }

  return {
    generatedAt: generatedAt.toISOString(),
    window: {
      start: report.window.start.toISOString(),
      end: report.window.end.toISOString(),
    },
    empty: report.empty,
    totals: {
      amber: report.amberCount,
      red: report.redCount,
      cause: { ...report.counts.cause },
      quality: { ...report.counts.quality },
    },
    exceptions,
    summary: {
      dateHistogram: report.summary.dateHistogram.map(({ key, count }) => ({ date: key, count })),
      deviceTotals: report.summary.deviceTotals.map(({ key, count }) => ({ deviceName: key, count })),
      causeTotals: report.summary.causeTotals.map(({ key, count }) => ({
        causeCode: key,
        description: describeCause(key),
        count,
      })),
      qualityDeviceTotals: report.summary.qualityDeviceTotals.map(({ key, count }) => ({
        deviceName: key,
        count,
      })),
    },
    diagnostics: { ...report.diagnostics },
  };
}

export class ReportWriter {
  private causeCodes: CauseCodeDescriptions;

  constructor(causeCodes: CauseCodeDescriptions) {
    this.causeCodes = causeCodes;
  }

  async write(report: ExceptionReport, outputPath: string): Promise<ReportDocument> {
    const document = toReportDocument(report, this.causeCodes);
    await FileManager.writeJSON(outputPath, document);
    logger.success(`Saved exception report to: ${outputPath}`);
    return document;
  }
}
