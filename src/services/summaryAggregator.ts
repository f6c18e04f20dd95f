/**
 * Summary aggregator - Overview counters for every notable call, whether or
 * not any of its groups reached amber
 */
import { compareText } from '../utils/fileManager.js';
import { groupKeysForCall } from './exceptionClassifier.js';
import type { Call, CountEntry, ExceptionSettings, SummaryTotals } from '../types/index.js';

/** UTC calendar date of an instant, as YYYY-MM-DD */
export function utcDateKey(time: Date): string {
  return time.toISOString().slice(0, 10);
}

function increment<K>(counter: Map<K, number>, key: K): void {
  counter.set(key, (counter.get(key) ?? 0) + 1);
}

function byCountThenText(a: CountEntry<string>, b: CountEntry<string>): number {
  return b.count - a.count || compareText(a.key, b.key);
}

function byCountThenCode(a: CountEntry<number>, b: CountEntry<number>): number {
  return b.count - a.count || a.key - b.key;
}

function entries<K>(counter: Map<K, number>): CountEntry<K>[] {
  return Array.from(counter, ([key, count]) => ({ key, count }));
}

/**
 * A call counts once per date, once per device it is notable on (source and
 * destination roles combined) and once per non-excluded cause code.
 */
export function aggregateSummary(calls: readonly Call[], settings: ExceptionSettings): SummaryTotals {
  const dates = new Map<string, number>();
  const devices = new Map<string, number>();
  const causes = new Map<number, number>();
  const qualityDevices = new Map<string, number>();

  for (const call of calls) {
    const keys = groupKeysForCall(call, settings);
    if (keys.length === 0) continue;

    increment(dates, utcDateKey(call.originationTime));

    const callDevices = new Set<string>();
    const callCauses = new Set<number>();
    const callQualityDevices = new Set<string>();
    for (const key of keys) {
      callDevices.add(key.deviceName);
      if (typeof key.value === 'number') {
        callCauses.add(key.value);
      } else {
        callQualityDevices.add(key.deviceName);
      }
    }
    callDevices.forEach((device) => increment(devices, device));
    callCauses.forEach((cause) => increment(causes, cause));
    callQualityDevices.forEach((device) => increment(qualityDevices, device));
  }

  return {
    dateHistogram: entries(dates).sort((a, b) => compareText(a.key, b.key)),
    deviceTotals: entries(devices).sort(byCountThenText),
    causeTotals: entries(causes).sort(byCountThenCode),
    qualityDeviceTotals: entries(qualityDevices).sort(byCountThenText),
  };
}
