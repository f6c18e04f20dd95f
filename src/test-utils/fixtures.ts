/**
 * Shared builders for tests
 */
import type {
  CallRecord,
  DateWindow,
  ExceptionSettings,
  QualityRecord,
} from '../types/index.js';

export const TEST_SETTINGS: ExceptionSettings = {
  excludedCauseCodes: new Set([0, 16, 17]),
  causeAmberThreshold: 3,
  causeRedThreshold: 5,
  mosThreshold: 3.7,
  ccrThreshold: 0.01,
  mosAmberThreshold: 3,
  mosRedThreshold: 5,
};

/** 2024-03-01, the whole UTC day */
export const TEST_WINDOW: DateWindow = {
  start: new Date('2024-03-01T00:00:00Z'),
  end: new Date('2024-03-01T23:59:59Z'),
};

let nextCallId = 1;

export function makeCall(overrides: Partial<CallRecord> = {}): CallRecord {
  return {
    kind: 'call',
    callId: `1:${nextCallId++}`,
    originationTime: new Date('2024-03-01T12:00:00Z'),
    origIp: '10.0.0.1',
    destIp: '10.0.0.2',
    callingNumber: '1000',
    originalCalledNumber: '2000',
    finalCalledNumber: '2000',
    duration: 60,
    ...overrides,
  };
}

export function makeQuality(overrides: Partial<QualityRecord> = {}): QualityRecord {
  return {
    kind: 'quality',
    callId: '1:0',
    timestamp: new Date('2024-03-01T12:01:00Z'),
    duration: 60,
    ...overrides,
  };
}

export function repeat<T>(count: number, build: () => T): T[] {
  return Array.from({ length: count }, build);
}
