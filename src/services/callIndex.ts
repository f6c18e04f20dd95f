/**
 * Call index - Correlates CMR quality records with their parent CDR
 *
 * One index per run: construct, ingest every record in file/row order, then
 * finalize once. Later CDRs with the same call id replace earlier ones, so the
 * ingestion order decides the result and must stay fixed between runs.
 */
import { logger } from '../utils/logger.js';
import type {
  Call,
  CallRecord,
  Leg,
  ParsedRecord,
  QualityMetrics,
  QualityRecord,
} from '../types/index.js';

export interface CorrelationResult {
  calls: Call[];
  orphanCount: number;
}

export interface CallIndexStats {
  callRecords: number;
  qualityRecords: number;
  replacedCalls: number;
  attachedQuality: number;
}

export class CallIndex {
  private calls = new Map<string, CallRecord>();
  private pending = new Map<string, QualityRecord[]>();
  private finalized = false;
  private stats: CallIndexStats = {
    callRecords: 0,
    qualityRecords: 0,
    replacedCalls: 0,
    attachedQuality: 0,
  };

  ingest(record: ParsedRecord): void {
    if (this.finalized) {
      throw new Error('CallIndex has already been finalized');
    }
    if (record.kind === 'call') {
      this.ingestCall(record);
    } else {
      this.ingestQuality(record);
    }
  }

  /**
   * Close the index and hand back the correlated calls. Quality records still
   * waiting for a CDR are orphans and are only counted.
   */
  finalize(): CorrelationResult {
    if (this.finalized) {
      throw new Error('CallIndex has already been finalized');
    }
    this.finalized = true;

    let orphanCount = 0;
    for (const [callId, records] of this.pending) {
      orphanCount += records.length;
      logger.debug(`No CDR for call ${callId}, dropping ${records.length} CMR(s)`);
    }
    this.pending.clear();

    const calls = Array.from(this.calls.values(), (call) => Object.freeze(call));
    this.calls.clear();
    return { calls, orphanCount };
  }

  getStats(): Readonly<CallIndexStats> {
    return { ...this.stats };
  }

  private ingestCall(record: CallRecord): void {
    this.stats.callRecords++;
    const call: CallRecord = { ...record };

    const previous = this.calls.get(call.callId);
    if (previous) {
      this.stats.replacedCalls++;
      logger.debug(`Duplicate CDR for call ${call.callId}, keeping the later one`);
      call.origQuality ??= previous.origQuality;
      call.destQuality ??= previous.destQuality;
    }
    this.calls.set(call.callId, call);

    const waiting = this.pending.get(call.callId);
    if (waiting) {
      this.pending.delete(call.callId);
      for (const quality of waiting) {
        this.attach(call, quality);
      }
    }
  }

  private ingestQuality(record: QualityRecord): void {
    this.stats.qualityRecords++;
    const call = this.calls.get(record.callId);
    if (call) {
      this.attach(call, record);
      return;
    }
    const waiting = this.pending.get(record.callId);
    if (waiting) {
      waiting.push(record);
    } else {
      this.pending.set(record.callId, [record]);
    }
  }

  private attach(call: CallRecord, record: QualityRecord): void {
    const metrics = toMetrics(record);
    const legs = resolveLegs(call, record);
    if (!metrics || legs.length === 0) {
      return;
    }
    this.stats.attachedQuality++;
    for (const leg of legs) {
      if (leg === 'source') {
        call.origQuality = metrics;
      } else {
        call.destQuality = metrics;
      }
    }
  }
}

/**
 * Work out which side of the call a CMR measured. Without an explicit leg the
 * device name decides; a device matching neither side (the call was
 * transferred under the same global call id) is recorded against both. A CMR
 * with no device name and no leg belongs to neither.
 */
export function resolveLegs(call: CallRecord, record: QualityRecord): Leg[] {
  if (record.leg) {
    return [record.leg];
  }
  if (record.deviceName === undefined) {
    return [];
  }
  if (record.deviceName === call.origDeviceName) {
    return ['source'];
  }
  if (record.deviceName === call.destDeviceName) {
    return ['destination'];
  }
  return ['source', 'destination'];
}

function toMetrics(record: QualityRecord): QualityMetrics | undefined {
  if (record.avgMos === undefined && record.ccr === undefined) {
    return undefined;
  }
  const metrics: QualityMetrics = {};
  if (record.deviceName !== undefined) metrics.deviceName = record.deviceName;
  if (record.avgMos !== undefined) metrics.avgMos = record.avgMos;
  if (record.ccr !== undefined) metrics.ccr = record.ccr;
  return metrics;
}
