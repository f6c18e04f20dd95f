/**
 * Date range filter - Keeps calls that originated inside the reporting window
 */
import type { Call, DateWindow } from '../types/index.js';

/** Both bounds inclusive */
export function isWithinWindow(time: Date, window: DateWindow): boolean {
  const t = time.getTime();
  return t >= window.start.getTime() && t <= window.end.getTime();
}

/**
 * Only the call's origination time counts; the timestamps of its CMRs are
 * never looked at.
 */
export function filterByDateRange(calls: readonly Call[], window: DateWindow): Call[] {
  return calls.filter((call) => isWithinWindow(call.originationTime, window));
}
