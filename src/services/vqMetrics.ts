/**
 * Extraction of call quality statistics from the composite varVQMetrics value,
 * e.g. "MLQK=4.0000;MLQKav=3.9520;MLQKmn=3.8000;MLQKmx=4.1000;ICR=0.0000;CCR=0.0021;..."
 *
 * Average MoS comes from MLQKav and the conceal ratio from CCR. The worst-case
 * fields (MLQKmn, ICRmx) are not used.
 */
import type { QualityMetrics } from '../types/index.js';

export const AVG_MOS_FIELD = 'MLQKav';
export const CCR_FIELD = 'CCR';

/**
 * Split the composite value into its key/value pairs. Pairs without "=" or
 * with an empty key are dropped.
 */
export function parseVqPairs(raw: string): Map<string, string> {
  const pairs = new Map<string, string>();
  for (const part of raw.split(';')) {
    const eq = part.indexOf('=');
    if (eq <= 0) continue;
    const key = part.slice(0, eq).trim();
    if (key) {
      pairs.set(key, part.slice(eq + 1).trim());
    }
  }
  return pairs;
}

function readDecimal(pairs: Map<string, string>, key: string): number | undefined {
  const value = pairs.get(key);
  if (value === undefined || !/^\d+(\.\d+)?$|^\.\d+$/.test(value)) {
    return undefined;
  }
  return Number(value);
}

/**
 * Pull average MoS and CCR out of a varVQMetrics value.
 * Returns undefined when neither statistic is present (video and failed
 * calls report no voice quality).
 */
export function extractQualityMetrics(
  raw: string | undefined,
  deviceName?: string
): QualityMetrics | undefined {
  if (!raw || raw.trim() === '') {
    return undefined;
  }
  const pairs = parseVqPairs(raw);
  const avgMos = readDecimal(pairs, AVG_MOS_FIELD);
  const ccr = readDecimal(pairs, CCR_FIELD);
  if (avgMos === undefined && ccr === undefined) {
    return undefined;
  }

  const metrics: QualityMetrics = {};
  if (deviceName !== undefined) metrics.deviceName = deviceName;
  if (avgMos !== undefined) metrics.avgMos = avgMos;
  if (ccr !== undefined) metrics.ccr = ccr;
  return metrics;
}
