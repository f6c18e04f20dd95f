/**
 * Exception classifier - Groups notable calls per device and grades each group
 *
 * A call joins a cause group for every (device side, cause side) pair whose
 * device name and cause code are both present and the code is not excluded,
 * and a quality group for every leg whose MoS or CCR breaches its threshold.
 */
import { compareText } from '../utils/fileManager.js';
import { POOR_QUALITY } from '../types/index.js';
import type {
  Call,
  CauseDimension,
  Classification,
  ClassificationResult,
  ExceptionGroup,
  ExceptionGroupKey,
  ExceptionSettings,
  Leg,
  QualityMetrics,
} from '../types/index.js';

const CAUSE_PAIRS: ReadonlyArray<{ role: Leg; dimension: CauseDimension }> = [
  { role: 'source', dimension: 'orig_cause' },
  { role: 'source', dimension: 'dest_cause' },
  { role: 'destination', dimension: 'orig_cause' },
  { role: 'destination', dimension: 'dest_cause' },
];

function deviceFor(call: Call, role: Leg): string | undefined {
  return role === 'source' ? call.origDeviceName : call.destDeviceName;
}

function causeFor(call: Call, dimension: CauseDimension): number | undefined {
  return dimension === 'orig_cause' ? call.origCauseCode : call.destCauseCode;
}

function qualityFor(call: Call, role: Leg): QualityMetrics | undefined {
  return role === 'source' ? call.origQuality : call.destQuality;
}

/**
 * Strict comparisons: a MoS equal to the threshold, or a CCR equal to the
 * threshold, is not a breach. Missing statistics never breach.
 */
export function isPoorQuality(metrics: QualityMetrics, settings: ExceptionSettings): boolean {
  const lowMos = metrics.avgMos !== undefined && metrics.avgMos < settings.mosThreshold;
  const highCcr = metrics.ccr !== undefined && metrics.ccr > settings.ccrThreshold;
  return lowMos || highCcr;
}

/**
 * Every group key a call belongs to, in a fixed order: the four cause pairs,
 * then source quality, then destination quality.
 */
export function groupKeysForCall(call: Call, settings: ExceptionSettings): ExceptionGroupKey[] {
  const keys: ExceptionGroupKey[] = [];

  for (const { role, dimension } of CAUSE_PAIRS) {
    const deviceName = deviceFor(call, role);
    const cause = causeFor(call, dimension);
    if (deviceName && cause !== undefined && !settings.excludedCauseCodes.has(cause)) {
      keys.push({ deviceName, role, dimension, value: cause });
    }
  }

  for (const role of ['source', 'destination'] as const) {
    const metrics = qualityFor(call, role);
    if (!metrics || !isPoorQuality(metrics, settings)) continue;
    const deviceName = metrics.deviceName ?? deviceFor(call, role);
    if (deviceName) {
      keys.push({ deviceName, role, dimension: 'quality', value: POOR_QUALITY });
    }
  }

  return keys;
}

export function groupKeyId(key: ExceptionGroupKey): string {
  return JSON.stringify([key.deviceName, key.role, key.dimension, key.value]);
}

export function classifyCount(
  count: number,
  dimension: ExceptionGroupKey['dimension'],
  settings: ExceptionSettings
): Classification {
  const quality = dimension === 'quality';
  const amber = quality ? settings.mosAmberThreshold : settings.causeAmberThreshold;
  const red = quality ? settings.mosRedThreshold : settings.causeRedThreshold;
  if (count >= red) return 'red';
  if (count >= amber) return 'amber';
  return 'none';
}

const ROLE_ORDER: Record<Leg, number> = { source: 0, destination: 1 };
const DIMENSION_ORDER: Record<ExceptionGroupKey['dimension'], number> = {
  orig_cause: 0,
  dest_cause: 1,
  quality: 2,
};

/**
 * Most instances first, then device name, then value (cause codes ascending,
 * quality last), then source before destination, then origin cause before
 * destination cause.
 */
export function compareGroups(a: ExceptionGroup, b: ExceptionGroup): number {
  if (a.instanceCount !== b.instanceCount) {
    return b.instanceCount - a.instanceCount;
  }
  const byDevice = compareText(a.key.deviceName, b.key.deviceName);
  if (byDevice !== 0) return byDevice;

  const aValue = a.key.value;
  const bValue = b.key.value;
  if (aValue !== bValue) {
    if (typeof aValue !== 'number') return 1;
    if (typeof bValue !== 'number') return -1;
    return aValue - bValue;
  }

  const byRole = ROLE_ORDER[a.key.role] - ROLE_ORDER[b.key.role];
  if (byRole !== 0) return byRole;
  return DIMENSION_ORDER[a.key.dimension] - DIMENSION_ORDER[b.key.dimension];
}

/**
 * Build every group, including those below the amber threshold
 */
export function buildGroups(calls: readonly Call[], settings: ExceptionSettings): ExceptionGroup[] {
  const groups = new Map<string, ExceptionGroup>();

  for (const call of calls) {
    for (const key of groupKeysForCall(call, settings)) {
      const id = groupKeyId(key);
      const group = groups.get(id);
      if (group) {
        group.calls.push(call);
      } else {
        groups.set(id, { key, calls: [call], instanceCount: 0, classification: 'none' });
      }
    }
  }

  const built = Array.from(groups.values());
  for (const group of built) {
    group.instanceCount = group.calls.length;
    group.classification = classifyCount(group.instanceCount, group.key.dimension, settings);
  }
  return built;
}

/**
 * Amber and red groups, ordered for the report, plus their tallies
 */
export function classifyExceptions(
  calls: readonly Call[],
  settings: ExceptionSettings
): ClassificationResult {
  const exceptions = buildGroups(calls, settings)
    .filter((group) => group.classification !== 'none')
    .sort(compareGroups);

  const counts = {
    cause: { amber: 0, red: 0 },
    quality: { amber: 0, red: 0 },
  };
  for (const group of exceptions) {
    const bucket = group.key.dimension === 'quality' ? counts.quality : counts.cause;
    if (group.classification === 'red') {
      bucket.red++;
    } else {
      bucket.amber++;
    }
  }

  return {
    exceptions,
    amberCount: counts.cause.amber + counts.quality.amber,
    redCount: counts.cause.red + counts.quality.red,
    counts,
  };
}
